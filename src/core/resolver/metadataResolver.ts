import axios from 'axios';
import { ArtifactRecord, MetadataSource, PackageMetadata } from '../../types';
import logger from '../../utils/logger';
import { TransportError } from '../errors';
import { isPyPIResponse, PyPIRelease, PyPIResponse } from '../shared/pip-types';

export interface MetadataResolverOptions {
  /** JSON API 기본 URL (예: https://pypi.org/pypi) */
  baseUrl: string;
  timeout?: number;
}

/**
 * 인덱스 JSON 문서 경로 ({name}/json 또는 {name}/{version}/json)
 */
export function buildMetadataUrl(baseUrl: string, name: string, version: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  const segments = version
    ? [encodeURIComponent(name), encodeURIComponent(version)]
    : [encodeURIComponent(name)];
  return `${base}/${segments.join('/')}/json`;
}

const toArtifactRecord = (file: PyPIRelease): ArtifactRecord => ({
  filename: file.filename,
  downloadUrl: file.url,
});

/**
 * PyPI 응답을 PackageMetadata로 변환
 * 버전 조회 응답은 releases 대신 urls에 파일 목록이 들어오는 경우가 있어 보충한다.
 * 버전 키는 모두 자체 속성으로 만든다. (`__proto__` 같은 키도 일반 키로 취급)
 */
export function toPackageMetadata(response: PyPIResponse): PackageMetadata {
  const current = response.info.version;
  const entries: [string, ArtifactRecord[]][] = Object.entries(response.releases).map(
    ([version, files]) => [version, files.map(toArtifactRecord)]
  );

  const hasCurrentFiles = entries.some(([version, records]) => version === current && records.length > 0);
  if (!hasCurrentFiles && response.urls && response.urls.length > 0) {
    entries.push([current, response.urls.map(toArtifactRecord)]);
  }

  return {
    latestVersion: current,
    releasesByVersion: Object.fromEntries(entries),
  };
}

/**
 * 설치할 버전의 아티팩트 목록 (없으면 null)
 */
export function candidatesFor(metadata: PackageMetadata, version: string): ArtifactRecord[] | null {
  const effectiveVersion = version || metadata.latestVersion;
  if (!Object.hasOwn(metadata.releasesByVersion, effectiveVersion)) return null;
  return metadata.releasesByVersion[effectiveVersion];
}

function isJsonContentType(contentType: unknown): boolean {
  return typeof contentType === 'string' && contentType.toLowerCase().includes('json');
}

/**
 * 패키지 인덱스 메타데이터 리졸버
 */
export class MetadataResolver implements MetadataSource {
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(options: MetadataResolverOptions) {
    this.baseUrl = options.baseUrl;
    this.timeout = options.timeout ?? 30000;
  }

  /**
   * 패키지 메타데이터 조회
   * 없는 패키지/버전, 에러 응답, JSON이 아닌 응답은 모두 null
   * 응답 자체를 받지 못한 경우(연결 실패 등)만 TransportError
   */
  async resolve(name: string, version: string): Promise<PackageMetadata | null> {
    const url = buildMetadataUrl(this.baseUrl, name, version);

    try {
      const response = await axios.get<unknown>(url, {
        timeout: this.timeout,
        headers: { Accept: 'application/json' },
      });

      if (!isJsonContentType(response.headers['content-type']) || !isPyPIResponse(response.data)) {
        logger.debug('메타데이터 문서가 아닌 응답', {
          name,
          version,
          contentType: response.headers['content-type'],
        });
        return null;
      }

      return toPackageMetadata(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        logger.debug('인덱스 에러 응답', { name, version, status: error.response.status });
        return null;
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.error('패키지 인덱스 조회 실패', { name, version, url, error: message });
      throw new TransportError(`인덱스 조회 실패: ${message}`, url);
    }
  }
}
