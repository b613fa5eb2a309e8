import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Config, getConfigManager } from '../../core/config';
import { Fetcher } from '../../core/downloaders/fetcher';
import { PipInstaller } from '../../core/installer/pipInstaller';
import { failureLines, hasFailures, InstallManager } from '../../core/installManager';
import { RequirementPipeline } from '../../core/requirementPipeline';
import { MetadataResolver } from '../../core/resolver/metadataResolver';
import {
  createLocalEnvironment,
  isArchType,
  isPlatformType,
  LocalEnvironment,
} from '../../core/shared/pip-tags';
import { DEFAULT_REQUIREMENTS_FILE, parseRequirements } from '../../core/shared/requirements';
import logger from '../../utils/logger';

// install 명령 옵션
export interface InstallCommandOptions {
  indexUrl?: string;
  concurrency?: string;
  pythonVersion?: string;
  platform?: string;
  arch?: string;
  python?: string;
  target?: string;
  failOnError?: boolean;
}

/**
 * 저장된 설정 위에 CLI 옵션 적용
 */
export function applyOptions(config: Config, options: InstallCommandOptions): Config {
  const merged: Config = { ...config };

  if (options.indexUrl) merged.indexUrl = options.indexUrl;
  if (options.pythonVersion) merged.pythonVersion = options.pythonVersion;
  if (options.python) merged.pythonPath = options.python;
  if (options.failOnError) merged.failOnError = true;
  if (options.concurrency !== undefined) {
    const concurrency = parseInt(options.concurrency, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`잘못된 동시 처리 수: ${options.concurrency}`);
    }
    merged.concurrency = concurrency;
  }

  return merged;
}

/**
 * 옵션에서 로컬 환경 생성
 */
export function buildEnvironment(config: Config, options: InstallCommandOptions): LocalEnvironment {
  const { platform, arch } = options;
  if (platform !== undefined && !isPlatformType(platform)) {
    throw new Error(`지원하지 않는 플랫폼: ${platform}`);
  }
  if (arch !== undefined && !isArchType(arch)) {
    throw new Error(`지원하지 않는 아키텍처: ${arch}`);
  }

  return createLocalEnvironment({
    pythonVersion: config.pythonVersion,
    platform,
    arch,
  });
}

/**
 * install 명령어 핸들러
 * 실패한 요구사항은 stdout에 한 줄씩 출력하고 종료 코드를 반환한다.
 */
export async function installCommand(
  file: string | undefined,
  options: InstallCommandOptions
): Promise<number> {
  const configManager = getConfigManager();
  const config = applyOptions(configManager.getConfig(), options);

  configManager.ensureDirectories();
  logger.initialize({ logsDir: configManager.getLogsDir(), level: config.logLevel });

  const requirementsPath = path.resolve(file ?? DEFAULT_REQUIREMENTS_FILE);
  const content = await fs.readFile(requirementsPath, 'utf-8');
  const requirements = parseRequirements(content);

  const environment = buildEnvironment(config, options);
  logger.info('wheelhouse 시작', {
    requirements: requirementsPath,
    count: requirements.length,
    python: environment.pythonVersion,
    platform: environment.platform,
    arch: environment.arch,
  });

  const pipeline = new RequirementPipeline({
    resolver: new MetadataResolver({ baseUrl: config.indexUrl, timeout: config.requestTimeout }),
    fetcher: new Fetcher({ timeout: config.downloadTimeout }),
    installer: new PipInstaller({ pythonPath: config.pythonPath, target: options.target }),
    environment,
  });
  const manager = new InstallManager(pipeline, { concurrency: config.concurrency });

  const report = await manager.run(requirements);

  for (const line of failureLines(report)) {
    console.log(line);
  }

  if (config.failOnError && hasFailures(report)) {
    console.error(chalk.yellow(`일부 패키지 설치 실패 (${failureLines(report).length}개)`));
    return 1;
  }
  return 0;
}
