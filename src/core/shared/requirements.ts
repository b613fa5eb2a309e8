// requirements.txt 파싱

import { Requirement } from '../../types';
import { RequirementParseError } from '../errors';

/** 기본 requirements 파일 경로 */
export const DEFAULT_REQUIREMENTS_FILE = 'requirements.txt';

const NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const VERSION_PATTERN = /^[A-Za-z0-9_.!+-]+$/;

/**
 * 한 줄 파싱 (`name` 또는 `name==version`)
 */
export function parseRequirementLine(raw: string, lineNumber: number): Requirement {
  const separator = raw.indexOf('==');
  const name = (separator === -1 ? raw : raw.slice(0, separator)).trim();
  const version = separator === -1 ? '' : raw.slice(separator + 2).trim();

  if (!NAME_PATTERN.test(name)) {
    throw new RequirementParseError(`잘못된 패키지명: '${raw}'`, lineNumber);
  }
  if (separator !== -1 && !VERSION_PATTERN.test(version)) {
    throw new RequirementParseError(`잘못된 버전 지정: '${raw}'`, lineNumber);
  }

  return { name, version };
}

/**
 * requirements 파일 내용 파싱
 * 빈 줄과 주석은 건너뛴다.
 */
export function parseRequirements(content: string): Requirement[] {
  const requirements: Requirement[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const trimmed = line.replace(/\s+#.*$/, '').trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    requirements.push(parseRequirementLine(trimmed, index + 1));
  });

  return requirements;
}

/**
 * 요구사항 표시 형식 (`name` 또는 `name==version`)
 */
export function formatRequirement(requirement: Requirement): string {
  return requirement.version ? `${requirement.name}==${requirement.version}` : requirement.name;
}
