/**
 * Wheel 파일 파싱 및 호환성 순위 계산
 *
 * 참고:
 * - https://peps.python.org/pep-0427/ (Wheel 형식)
 */

import { ArtifactRecord } from '../../types';
import { CompatibilityTag, getTagPriority } from './pip-tags';

/** 바이너리 아티팩트 확장자 */
export const WHEEL_SUFFIX = '.whl';

/**
 * Wheel 파일명에서 얻은 아티팩트 정보
 */
export interface ArtifactDescriptor {
  record: ArtifactRecord;
  /** 패키지 이름 (정규화됨) */
  name: string;
  version: string;
  buildTag?: BuildTag;
  runtimeTag: string;
  abiTag: string;
  platformTag: string;
  /** 압축 태그셋(py2.py3 등)을 펼친 태그 목록 */
  expandedTags: CompatibilityTag[];
  /** 로컬 환경 기준 순위 (-1이면 설치 불가) */
  rank: number;
}

/**
 * 빌드 태그 (빌드 번호 + 빌드 문자열)
 */
export type BuildTag = [number, string];

/**
 * Wheel 파일명 파싱 정규식
 * 형식: {distribution}-{version}(-{build tag})?-{python tag}-{abi tag}-{platform tag}.whl
 */
const WHEEL_FILENAME_REGEX =
  /^(?<name>[A-Za-z0-9](?:[A-Za-z0-9._]*[A-Za-z0-9])?)-(?<version>[A-Za-z0-9_.!+]+?)(?:-(?<build>\d[^-]*))?-(?<pyver>[^-]+)-(?<abi>[^-]+)-(?<plat>[^-]+)\.whl$/;

/**
 * 패키지 이름 정규화 (PEP 503)
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * 파일명이 wheel 파일인지 확인
 */
export function isWheelFile(filename: string): boolean {
  return filename.endsWith(WHEEL_SUFFIX);
}

/**
 * 압축 태그셋 확장 (py2.py3-none-any -> py2-none-any, py3-none-any)
 */
export function expandTags(runtime: string, abi: string, platform: string): CompatibilityTag[] {
  const tags: CompatibilityTag[] = [];
  for (const runtimeTag of runtime.split('.')) {
    for (const abiTag of abi.split('.')) {
      for (const platformTag of platform.split('.')) {
        tags.push({ runtimeTag, abiTag, platformTag });
      }
    }
  }
  return tags;
}

/**
 * 펼친 태그 중 가장 좋은 순위 반환 (-1이면 호환 안 됨)
 */
export function computeRank(
  expandedTags: readonly CompatibilityTag[],
  supportedTags: readonly CompatibilityTag[]
): number {
  let best = -1;
  for (const tag of expandedTags) {
    const priority = getTagPriority(tag, supportedTags);
    if (priority !== -1 && (best === -1 || priority < best)) {
      best = priority;
    }
  }
  return best;
}

/**
 * 아티팩트 레코드를 디스크립터로 변환
 * wheel이 아니거나 태그 구조가 맞지 않으면 null
 */
export function parseArtifact(
  record: ArtifactRecord,
  supportedTags: readonly CompatibilityTag[]
): ArtifactDescriptor | null {
  if (!isWheelFile(record.filename)) return null;

  const match = record.filename.match(WHEEL_FILENAME_REGEX);
  if (!match?.groups) return null;

  const { name, version, build, pyver, abi, plat } = match.groups;

  let buildTag: BuildTag | undefined;
  if (build) {
    buildTag = [parseInt(build, 10), build.replace(/^\d+/, '')];
  }

  const expandedTags = expandTags(pyver, abi, plat);
  if (expandedTags.some((tag) => !tag.runtimeTag || !tag.abiTag || !tag.platformTag)) {
    return null;
  }

  return {
    record,
    name: normalizePackageName(name),
    version,
    buildTag,
    runtimeTag: pyver,
    abiTag: abi,
    platformTag: plat,
    expandedTags,
    rank: computeRank(expandedTags, supportedTags),
  };
}

/**
 * 설치 가능 여부
 */
export function isInstallable(descriptor: ArtifactDescriptor): boolean {
  return descriptor.rank !== -1;
}

/**
 * 후보 목록을 디스크립터로 변환 후 순위 오름차순 정렬
 * Array.prototype.sort는 안정 정렬이므로 같은 순위는 인덱스 순서를 유지한다.
 * 설치 불가 디스크립터는 뒤로 보낸다.
 */
export function rankArtifacts(
  candidates: readonly ArtifactRecord[],
  supportedTags: readonly CompatibilityTag[]
): ArtifactDescriptor[] {
  const descriptors: ArtifactDescriptor[] = [];
  for (const record of candidates) {
    const descriptor = parseArtifact(record, supportedTags);
    if (descriptor) descriptors.push(descriptor);
  }

  return descriptors.sort((a, b) => {
    if (a.rank === -1 && b.rank === -1) return 0;
    if (a.rank === -1) return 1;
    if (b.rank === -1) return -1;
    return a.rank - b.rank;
  });
}

/**
 * 최적의 아티팩트 선택 (설치 가능한 것이 없으면 null)
 */
export function selectBest(
  candidates: readonly ArtifactRecord[],
  supportedTags: readonly CompatibilityTag[]
): ArtifactRecord | null {
  const winner = rankArtifacts(candidates, supportedTags).find(isInstallable);
  return winner ? winner.record : null;
}
