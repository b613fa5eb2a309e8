#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../core/errors';
import logger from '../utils/logger';
import type { InstallCommandOptions } from './commands/install';

// 버전 정보
const VERSION = '1.0.0';

/**
 * 명령 실행 중 발생한 에러 출력 후 종료 코드 1
 */
function fail(error: unknown): void {
  if (error instanceof Error) {
    logger.debug(error.stack ?? error.message);
  }
  console.error(chalk.red(`오류: ${errorMessage(error)}`));
  process.exitCode = 1;
}

// 메인 프로그램
const program = new Command();

program
  .name('wheelhouse')
  .description(chalk.cyan('wheelhouse - 고정 버전 Python wheel 병렬 설치 도구'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// install 명령어
program
  .command('install')
  .description('requirements 파일의 패키지 설치')
  .argument('[file]', 'requirements 파일 (기본: requirements.txt)')
  .option('-i, --index-url <url>', '패키지 인덱스 JSON API URL')
  .option('-c, --concurrency <num>', '동시 처리 수')
  .option('-P, --python-version <version>', '대상 Python 버전 (예: 3.11)')
  .option('--platform <platform>', '플랫폼 (linux, macos, windows, any)')
  .option('--arch <arch>', '아키텍처 (x86_64, arm64, aarch64 등)')
  .option('--python <path>', '설치에 사용할 Python 실행 파일')
  .option('-t, --target <dir>', '설치 대상 디렉토리')
  .option('--fail-on-error', '실패한 패키지가 있으면 종료 코드 1')
  .action(async (file: string | undefined, options: InstallCommandOptions) => {
    try {
      const { installCommand } = await import('./commands/install');
      process.exitCode = await installCommand(file, options);
    } catch (error) {
      fail(error);
    }
  });

// tags 명령어
program
  .command('tags')
  .description('로컬 환경의 호환성 태그 목록')
  .option('-P, --python-version <version>', '대상 Python 버전')
  .option('--platform <platform>', '플랫폼')
  .option('--arch <arch>', '아키텍처')
  .action(async (options: InstallCommandOptions) => {
    try {
      const { tagsCommand } = await import('./commands/tags');
      tagsCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key: string | undefined) => {
        const { configGet } = await import('./commands/config');
        configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        try {
          const { configSet } = await import('./commands/config');
          configSet(key, value);
        } catch (error) {
          fail(error);
        }
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        configReset();
      })
  );

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch(fail);
}
