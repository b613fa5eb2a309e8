// PyPI JSON API 타입 정의

/**
 * PyPI 릴리스 정보 (wheel/sdist 파일)
 */
export interface PyPIRelease {
  filename: string;
  url: string;
  size?: number;
  digests?: {
    md5?: string;
    sha256?: string;
  };
  packagetype?: 'sdist' | 'bdist_wheel' | 'bdist_egg';
  python_version?: string;
  requires_python?: string | null;
  yanked?: boolean;
}

/**
 * PyPI 패키지 정보
 */
export interface PyPIInfo {
  name?: string;
  version: string;
  summary?: string;
  requires_python?: string | null;
}

/**
 * PyPI API 응답 (pypi.org/pypi/{package}[/{version}]/json)
 */
export interface PyPIResponse {
  info: PyPIInfo;
  releases: Record<string, PyPIRelease[]>;
  urls?: PyPIRelease[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRelease(value: unknown): value is PyPIRelease {
  return (
    isRecord(value) &&
    typeof value.filename === 'string' &&
    typeof value.url === 'string'
  );
}

/**
 * 응답 본문이 PyPI 메타데이터 문서인지 확인
 * HTML 에러 페이지 등은 문자열로 들어오므로 여기서 걸러짐
 */
export function isPyPIResponse(data: unknown): data is PyPIResponse {
  if (!isRecord(data)) return false;

  const { info, releases, urls } = data;
  if (!isRecord(info) || typeof info.version !== 'string') return false;
  if (!isRecord(releases)) return false;
  if (urls !== undefined && !(Array.isArray(urls) && urls.every(isRelease))) return false;

  return Object.values(releases).every(
    (files) => Array.isArray(files) && files.every(isRelease)
  );
}
