/**
 * PEP 425 호환성 태그 생성기
 * 로컬 환경이 받아들이는 {runtime}-{abi}-{platform} 조합을 우선순위 순으로 만든다.
 *
 * 참고:
 * - https://peps.python.org/pep-0425/
 * - https://packaging.python.org/en/latest/specifications/platform-compatibility-tags/
 */

/**
 * PEP 425 태그 형식: {runtime_tag}-{abi_tag}-{platform_tag}
 */
export interface CompatibilityTag {
  runtimeTag: string; // cp311, py3
  abiTag: string; // cp311, abi3, none
  platformTag: string; // manylinux_2_17_x86_64, win_amd64, any
}

/** 어느 쪽에 있든 모든 값과 일치하는 태그 */
export const WILDCARD_TAG = '*';

/** 아티팩트 쪽 플랫폼 태그가 이 값이면 모든 플랫폼과 일치 */
export const ANY_PLATFORM = 'any';

/**
 * 플랫폼 타입
 */
export type PlatformType = 'windows' | 'macos' | 'linux' | 'any';

/**
 * 아키텍처 타입
 */
export type ArchType = 'x86_64' | 'amd64' | 'arm64' | 'aarch64' | 'i386' | 'i686' | 'any';

export const PLATFORM_TYPES: readonly PlatformType[] = ['windows', 'macos', 'linux', 'any'];
export const ARCH_TYPES: readonly ArchType[] = ['x86_64', 'amd64', 'arm64', 'aarch64', 'i386', 'i686', 'any'];

export function isPlatformType(value: string): value is PlatformType {
  return PLATFORM_TYPES.some((platform) => platform === value);
}

export function isArchType(value: string): value is ArchType {
  return ARCH_TYPES.some((arch) => arch === value);
}

/**
 * 로컬 실행 환경 설정
 */
export interface EnvironmentOptions {
  /** Python 버전 (예: "3.11") */
  pythonVersion: string;
  platform?: PlatformType;
  arch?: ArchType;
  /** Python 구현체 ("cp" = CPython) */
  implementation?: string;
}

/**
 * 로컬 실행 환경 (프로세스 시작 시 한 번 생성, 이후 읽기 전용)
 */
export interface LocalEnvironment {
  readonly pythonVersion: string;
  readonly platform: PlatformType;
  readonly arch: ArchType;
  readonly implementation: string;
  /** 우선순위 순 허용 태그 목록 (앞쪽일수록 선호) */
  readonly tags: readonly CompatibilityTag[];
}

/**
 * 태그를 문자열로 변환
 */
export function tagToString(tag: CompatibilityTag): string {
  return `${tag.runtimeTag}-${tag.abiTag}-${tag.platformTag}`;
}

/**
 * 문자열에서 태그 파싱
 */
export function parseTag(tagString: string): CompatibilityTag | null {
  const parts = tagString.split('-');
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) return null;

  const [runtimeTag, abiTag, platformTag] = parts;
  return { runtimeTag, abiTag, platformTag };
}

function parsePythonVersion(version: string): [number, number] {
  const match = version.trim().match(/^(\d+)\.(\d+)/);
  if (!match) {
    throw new Error(`잘못된 Python 버전: ${version}`);
  }
  return [Number(match[1]), Number(match[2])];
}

/**
 * 구현체 전용 태그 생성 (cp311-cp311, cp311-abi3, cp311-none, 이전 버전 abi3)
 */
export function generateInterpreterTags(
  major: number,
  minor: number,
  implementation: string,
  platforms: string[]
): CompatibilityTag[] {
  const tags: CompatibilityTag[] = [];
  const interpreter = `${implementation}${major}${minor}`;

  for (const abi of [interpreter, 'abi3', 'none']) {
    for (const platform of platforms) {
      tags.push({ runtimeTag: interpreter, abiTag: abi, platformTag: platform });
    }
  }

  // abi3는 이전 마이너 버전용으로 빌드된 것도 사용 가능
  if (major >= 3) {
    for (let m = minor - 1; m >= 2; m--) {
      for (const platform of platforms) {
        tags.push({
          runtimeTag: `${implementation}${major}${m}`,
          abiTag: 'abi3',
          platformTag: platform,
        });
      }
    }
  }

  return tags;
}

/**
 * 범용 Python 태그 생성 (순수 Python 패키지용)
 * pyXY-none-{platform} ... pyX-none-{platform}, 마지막에 -any
 */
export function generateCompatibleTags(
  major: number,
  minor: number,
  platforms: string[]
): CompatibilityTag[] {
  const tags: CompatibilityTag[] = [];
  const runtimes: string[] = [];

  for (let m = minor; m >= 0; m--) {
    runtimes.push(`py${major}${m}`);
  }
  runtimes.push(`py${major}`);

  for (const runtime of runtimes) {
    for (const platform of platforms) {
      tags.push({ runtimeTag: runtime, abiTag: 'none', platformTag: platform });
    }
  }

  for (const runtime of runtimes) {
    tags.push({ runtimeTag: runtime, abiTag: 'none', platformTag: ANY_PLATFORM });
  }

  return tags;
}

/**
 * Linux 플랫폼 태그 생성 (최신 glibc -> 오래된 순)
 */
export function generateLinuxPlatformTags(arch: ArchType): string[] {
  const tags: string[] = [];
  const normalizedArch = normalizeArch(arch);

  const glibcVersions = [
    [2, 35], [2, 34], [2, 31], [2, 28], [2, 27], [2, 24], [2, 17], [2, 12], [2, 5],
  ];

  for (const [major, minor] of glibcVersions) {
    tags.push(`manylinux_${major}_${minor}_${normalizedArch}`);
  }

  // 레거시 manylinux 별칭
  if (normalizedArch === 'x86_64' || normalizedArch === 'i686') {
    tags.push(`manylinux2014_${normalizedArch}`);
    tags.push(`manylinux2010_${normalizedArch}`);
    tags.push(`manylinux1_${normalizedArch}`);
  } else if (normalizedArch === 'aarch64') {
    tags.push(`manylinux2014_${normalizedArch}`);
  }

  tags.push(`linux_${normalizedArch}`);

  return tags;
}

/**
 * macOS 플랫폼 태그 생성 (최신 -> 오래된 순)
 */
export function generateMacOSPlatformTags(arch: ArchType): string[] {
  const tags: string[] = [];
  const normalizedArch = normalizeArch(arch) === 'aarch64' ? 'arm64' : normalizeArch(arch);

  for (let v = 15; v >= 11; v--) {
    tags.push(`macosx_${v}_0_${normalizedArch}`);
    tags.push(`macosx_${v}_0_universal2`);
  }

  // arm64는 macOS 11 이전 빌드가 없음
  if (normalizedArch !== 'arm64') {
    for (let minor = 16; minor >= 9; minor--) {
      tags.push(`macosx_10_${minor}_${normalizedArch}`);
      tags.push(`macosx_10_${minor}_universal2`);
      tags.push(`macosx_10_${minor}_intel`);
      tags.push(`macosx_10_${minor}_universal`);
    }
  }

  return tags;
}

/**
 * Windows 플랫폼 태그 생성
 */
export function generateWindowsPlatformTags(arch: ArchType): string[] {
  switch (normalizeArch(arch)) {
    case 'x86_64':
      return ['win_amd64'];
    case 'arm64':
    case 'aarch64':
      return ['win_arm64'];
    case 'i686':
      return ['win32'];
    default:
      return [];
  }
}

/**
 * 타겟 플랫폼에 맞는 플랫폼 태그 생성 ('any'는 포함하지 않음)
 */
export function generatePlatformTags(platform: PlatformType, arch: ArchType): string[] {
  if (arch === 'any') return [];

  switch (platform) {
    case 'linux':
      return generateLinuxPlatformTags(arch);
    case 'macos':
      return generateMacOSPlatformTags(arch);
    case 'windows':
      return generateWindowsPlatformTags(arch);
    case 'any':
    default:
      return [];
  }
}

/**
 * 아키텍처 이름 정규화
 */
export function normalizeArch(arch: ArchType): string {
  switch (arch) {
    case 'amd64':
      return 'x86_64';
    case 'i386':
      return 'i686';
    default:
      return arch;
  }
}

/**
 * Node.js의 process.platform 값을 플랫폼 타입으로 변환
 */
export function detectPlatform(nodePlatform: string = process.platform): PlatformType {
  switch (nodePlatform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'any';
  }
}

/**
 * Node.js의 process.arch 값을 아키텍처 타입으로 변환
 */
export function detectArch(nodeArch: string = process.arch): ArchType {
  switch (nodeArch) {
    case 'x64':
      return 'x86_64';
    case 'arm64':
      return 'arm64';
    case 'ia32':
      return 'i686';
    default:
      return 'any';
  }
}

/**
 * 지원 태그 목록 생성 (pip과 같은 순서)
 */
export function getSupportedTags(options: EnvironmentOptions): CompatibilityTag[] {
  const [major, minor] = parsePythonVersion(options.pythonVersion);
  const implementation = options.implementation ?? 'cp';
  const platform = options.platform ?? detectPlatform();
  const arch = options.arch ?? detectArch();

  // linux aarch64 휠은 arm64가 아닌 aarch64 이름을 사용
  const platformArch: ArchType = platform === 'linux' && arch === 'arm64' ? 'aarch64' : arch;
  const platforms = generatePlatformTags(platform, platformArch);

  const tags: CompatibilityTag[] = [];
  if (implementation === 'cp') {
    tags.push(...generateInterpreterTags(major, minor, implementation, platforms));
  }
  tags.push(...generateCompatibleTags(major, minor, platforms));

  // 중복 제거 (첫 번째 위치 유지)
  const seen = new Set<string>();
  return tags.filter((tag) => {
    const key = tagToString(tag);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * 로컬 환경 생성
 */
export function createLocalEnvironment(options: EnvironmentOptions): LocalEnvironment {
  const platform = options.platform ?? detectPlatform();
  const arch = options.arch ?? detectArch();
  const implementation = options.implementation ?? 'cp';
  const tags = getSupportedTags({ ...options, platform, arch, implementation }).map((tag) =>
    Object.freeze(tag)
  );

  return Object.freeze({
    pythonVersion: options.pythonVersion,
    platform,
    arch,
    implementation,
    tags: Object.freeze(tags),
  });
}

/**
 * 주어진 태그 목록으로 환경 생성 (설정/테스트용)
 */
export function createEnvironmentFromTags(
  tags: readonly CompatibilityTag[],
  base: Partial<Omit<LocalEnvironment, 'tags'>> = {}
): LocalEnvironment {
  return Object.freeze({
    pythonVersion: base.pythonVersion ?? '',
    platform: base.platform ?? 'any',
    arch: base.arch ?? 'any',
    implementation: base.implementation ?? '',
    tags: Object.freeze(tags.map((tag) => Object.freeze({ ...tag }))),
  });
}

function componentMatches(fileComponent: string, envComponent: string): boolean {
  return (
    fileComponent === envComponent ||
    fileComponent === WILDCARD_TAG ||
    envComponent === WILDCARD_TAG
  );
}

/**
 * 아티팩트 태그가 허용 태그 하나를 만족하는지 확인
 */
export function tagSatisfies(fileTag: CompatibilityTag, envTag: CompatibilityTag): boolean {
  return (
    componentMatches(fileTag.runtimeTag, envTag.runtimeTag) &&
    componentMatches(fileTag.abiTag, envTag.abiTag) &&
    (fileTag.platformTag === ANY_PLATFORM ||
      componentMatches(fileTag.platformTag, envTag.platformTag))
  );
}

/**
 * 파일 태그의 우선순위 반환 (낮을수록 좋음)
 * -1이면 호환되지 않음
 */
export function getTagPriority(
  fileTag: CompatibilityTag,
  supportedTags: readonly CompatibilityTag[]
): number {
  return supportedTags.findIndex((envTag) => tagSatisfies(fileTag, envTag));
}
