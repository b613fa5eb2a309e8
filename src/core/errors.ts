// 설치 과정에서 사용하는 에러 클래스

/**
 * 네트워크/저장소 오류 (연결 실패, 비정상 상태 코드, 파일 쓰기 실패)
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * 인스톨러가 아티팩트 설치를 거부하거나 실패한 경우
 */
export class InstallError extends Error {
  constructor(
    message: string,
    public readonly artifactPath: string
  ) {
    super(message);
    this.name = 'InstallError';
  }
}

/**
 * requirements 파일의 잘못된 줄
 */
export class RequirementParseError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${line}번째 줄: ${message}`);
    this.name = 'RequirementParseError';
  }
}

/**
 * 알 수 없는 에러 값에서 메시지 추출
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
