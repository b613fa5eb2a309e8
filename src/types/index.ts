// ============================================
// 요구사항 관련 타입
// ============================================

/** 설치 요구사항 (requirements.txt의 한 줄) */
export interface Requirement {
  readonly name: string;
  /** 빈 문자열이면 최신 버전 */
  readonly version: string;
}

// ============================================
// 패키지 인덱스 관련 타입
// ============================================

/** 배포된 바이너리 아티팩트 하나 */
export interface ArtifactRecord {
  filename: string;
  downloadUrl: string;
}

/** 메타데이터 리졸버가 반환하는 패키지 정보 */
export interface PackageMetadata {
  /** 인덱스가 보고한 현재 버전 (info.version) */
  latestVersion: string;
  releasesByVersion: Record<string, ArtifactRecord[]>;
}

// ============================================
// 설치 결과 관련 타입
// ============================================

/** 요구사항별 최종 결과 종류 */
export type OutcomeKind =
  | 'installed'
  | 'missing'
  | 'no-compatible-artifact'
  | 'transport-failure'
  | 'install-failure';

/** 요구사항별 최종 결과 */
export type Outcome =
  | { kind: 'installed'; requirement: Requirement; filename: string }
  | { kind: 'missing'; requirement: Requirement }
  | { kind: 'no-compatible-artifact'; requirement: Requirement; version: string }
  | { kind: 'transport-failure'; requirement: Requirement; detail: string }
  | { kind: 'install-failure'; requirement: Requirement; detail: string };

/** 입력 순서를 유지하는 배치 결과 */
export type BatchReport = Outcome[];

// ============================================
// 협력자 인터페이스
// ============================================

/** 설치 옵션 */
export interface InstallOptions {
  /** 이미 설치된 같은 패키지를 덮어쓸지 여부 */
  overwrite: boolean;
}

/** 다운로드된 아티팩트를 시스템에 적용하는 협력자 */
export interface Installer {
  install(artifactPath: string, options: InstallOptions): Promise<void>;
}

/** 아티팩트 다운로드 결과 */
export type FetchResult =
  | { ok: true; bytes: number }
  | { ok: false; detail: string };

/** URL의 내용을 로컬 경로에 저장하는 협력자 */
export interface ArtifactFetcher {
  fetch(url: string, destinationPath: string): Promise<FetchResult>;
}

/** 패키지 인덱스 조회 협력자 (null = 패키지/버전 없음) */
export interface MetadataSource {
  resolve(name: string, version: string): Promise<PackageMetadata | null>;
}
