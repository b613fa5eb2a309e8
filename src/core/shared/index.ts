// 공통 모듈 진입점

// PyPI 타입
export { isPyPIResponse } from './pip-types';
export type { PyPIRelease, PyPIInfo, PyPIResponse } from './pip-types';

// PEP 425 호환성 태그 (pip-tags.ts)
export {
  WILDCARD_TAG,
  ANY_PLATFORM,
  tagToString,
  parseTag,
  generateInterpreterTags,
  generateCompatibleTags,
  generateLinuxPlatformTags,
  generateMacOSPlatformTags,
  generateWindowsPlatformTags,
  generatePlatformTags,
  normalizeArch,
  detectPlatform,
  detectArch,
  getSupportedTags,
  createLocalEnvironment,
  createEnvironmentFromTags,
  tagSatisfies,
  getTagPriority,
} from './pip-tags';
export type {
  CompatibilityTag,
  EnvironmentOptions,
  LocalEnvironment,
  PlatformType,
  ArchType,
} from './pip-tags';

// Wheel 파일 파싱 및 순위 (pip-wheel.ts)
export {
  WHEEL_SUFFIX,
  normalizePackageName,
  isWheelFile,
  expandTags,
  computeRank,
  parseArtifact,
  isInstallable,
  rankArtifacts,
  selectBest,
} from './pip-wheel';
export type { ArtifactDescriptor, BuildTag } from './pip-wheel';

// requirements 파싱
export {
  DEFAULT_REQUIREMENTS_FILE,
  parseRequirementLine,
  parseRequirements,
  formatRequirement,
} from './requirements';
