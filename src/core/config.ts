import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import logger, { isLogLevel, LogLevel } from '../utils/logger';

// 설정 인터페이스 정의
export interface Config {
  /** 패키지 인덱스 JSON API 기본 URL */
  indexUrl: string;
  /** 동시에 처리할 요구사항 수 */
  concurrency: number;
  /** 호환성 태그 계산에 사용할 Python 버전 */
  pythonVersion: string;
  /** 설치에 사용할 Python 실행 파일 */
  pythonPath: string;
  /** 메타데이터 요청 타임아웃 (ms) */
  requestTimeout: number;
  /** 아티팩트 다운로드 타임아웃 (ms) */
  downloadTimeout: number;
  logLevel: LogLevel;
  /** 실패한 요구사항이 있으면 종료 코드 1 */
  failOnError: boolean;
}

export type ConfigKey = keyof Config;

// 기본 설정값
export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
  indexUrl: 'https://pypi.org/pypi',
  concurrency: 8,
  pythonVersion: '3.11',
  pythonPath: 'python3',
  requestTimeout: 30000,
  downloadTimeout: 300000,
  logLevel: 'info',
  failOnError: false,
});

// 설정 항목 설명 (config list 출력용)
export const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  indexUrl: '패키지 인덱스 URL',
  concurrency: '동시 처리 수',
  pythonVersion: '대상 Python 버전',
  pythonPath: 'Python 실행 파일',
  requestTimeout: '메타데이터 요청 타임아웃(ms)',
  downloadTimeout: '다운로드 타임아웃(ms)',
  logLevel: '로그 레벨',
  failOnError: '실패 시 종료 코드 1',
};

const CONFIG_KEYS: readonly ConfigKey[] = [
  'indexUrl',
  'concurrency',
  'pythonVersion',
  'pythonPath',
  'requestTimeout',
  'downloadTimeout',
  'logLevel',
  'failOnError',
];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

type ConfigValidators = { [K in ConfigKey]: (value: unknown) => value is Config[K] };

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.length > 0;

const VALIDATORS: ConfigValidators = {
  indexUrl: isNonEmptyString,
  concurrency: isPositiveInteger,
  pythonVersion: (value): value is string => isNonEmptyString(value) && /^\d+\.\d+/.test(value),
  pythonPath: isNonEmptyString,
  requestTimeout: isPositiveInteger,
  downloadTimeout: isPositiveInteger,
  logLevel: isLogLevel,
  failOnError: (value): value is boolean => typeof value === 'boolean',
};

/**
 * 설정 항목 하나 검증 (잘못된 값이면 undefined)
 */
export function validateConfigValue<K extends ConfigKey>(
  key: K,
  value: unknown
): Config[K] | undefined {
  const isValid = VALIDATORS[key];
  return isValid(value) ? value : undefined;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir?: string) {
    this.configDir =
      configDir ?? process.env.WHEELHOUSE_HOME ?? path.join(os.homedir(), '.wheelhouse');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  ensureDirectories(): void {
    fs.ensureDirSync(this.configDir);
    fs.ensureDirSync(this.logsDir);
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 저장된 설정을 기본값 위에 병합하여 반환합니다.
   * 잘못된 값은 경고 후 기본값을 사용합니다.
   */
  getConfig(): Config {
    const config: Config = { ...DEFAULT_CONFIG };
    const raw = this.readRaw();

    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) continue;
      if (!this.assign(config, key, value)) {
        logger.warn('잘못된 설정값, 기본값 사용', { key, value });
      }
    }

    return config;
  }

  /**
   * 설정값을 저장합니다.
   */
  set(key: string, value: unknown): void {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }
    if (validateConfigValue(key, value) === undefined) {
      throw new Error(`잘못된 설정값: ${key} = ${JSON.stringify(value)}`);
    }

    const raw = this.readRaw();
    raw[key] = value;
    this.ensureDirectories();
    fs.writeJsonSync(this.configPath, raw, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): Config {
    this.ensureDirectories();
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
    return { ...DEFAULT_CONFIG };
  }

  private assign<K extends ConfigKey>(config: Config, key: K, value: unknown): boolean {
    const validated = validateConfigValue(key, value);
    if (validated === undefined) return false;
    config[key] = validated;
    return true;
  }

  private readRaw(): Record<string, unknown> {
    if (!fs.pathExistsSync(this.configPath)) return {};

    try {
      const data: unknown = fs.readJsonSync(this.configPath);
      if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
        return { ...data };
      }
      logger.warn('설정 파일 형식이 올바르지 않음, 기본값 사용', { path: this.configPath });
    } catch (error) {
      logger.warn('설정 파일 로드 실패, 기본값 사용', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
