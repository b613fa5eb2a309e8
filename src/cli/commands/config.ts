import chalk from 'chalk';
import Table from 'cli-table3';
import { CONFIG_DESCRIPTIONS, DEFAULT_CONFIG, getConfigManager, isConfigKey } from '../../core/config';

/**
 * 문자열 인자를 설정값으로 변환 (숫자, 불리언, 문자열)
 * 문자열 항목은 숫자처럼 보여도 문자열로 둔다. (예: pythonVersion 3.12)
 */
export function parseConfigValue(key: string, value: string): unknown {
  if (isConfigKey(key) && typeof DEFAULT_CONFIG[key] === 'string') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * 설정값 조회
 */
export function configGet(key?: string): void {
  const config = getConfigManager().getConfig();

  if (!key) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  if (!isConfigKey(key)) {
    console.error(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(config[key]));
}

/**
 * 설정값 변경
 */
export function configSet(key: string, value: string): void {
  const parsedValue = parseConfigValue(key, value);
  getConfigManager().set(key, parsedValue);
  console.error(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(parsedValue)}`));
}

/**
 * 모든 설정 표시
 */
export function configList(): void {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [20, 30, 32],
  });

  for (const [key, value] of Object.entries(config)) {
    const description = isConfigKey(key) ? CONFIG_DESCRIPTIONS[key] : '';
    table.push([key, JSON.stringify(value), description]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`설정 파일: ${configManager.getConfigPath()}`));
}

/**
 * 설정 초기화
 */
export function configReset(): void {
  getConfigManager().reset();
  console.error(chalk.green('✓ 설정이 초기화되었습니다'));
}
