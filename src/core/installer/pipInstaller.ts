import { execFile } from 'child_process';
import { Installer, InstallOptions } from '../../types';
import logger from '../../utils/logger';
import { InstallError } from '../errors';

/**
 * 외부 명령 실행 결과
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** 외부 명령 실행기 (테스트에서 교체 가능) */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

/**
 * child_process.execFile 기반 기본 실행기
 * 종료 코드가 0이 아니어도 reject하지 않고 결과로 돌려준다.
 */
export const execFileRunner: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        // 실행 파일을 찾지 못한 경우 등
        reject(error);
        return;
      }
      resolve({
        exitCode: error && typeof error.code === 'number' ? error.code : 0,
        stdout: String(stdout),
        stderr: String(stderr),
      });
    });
  });

export interface PipInstallerOptions {
  /** Python 실행 파일 경로 */
  pythonPath: string;
  /** 설치 대상 디렉토리 (pip --target) */
  target?: string;
  runner?: CommandRunner;
}

/**
 * pip로 wheel 파일을 설치하는 인스톨러
 */
export class PipInstaller implements Installer {
  private readonly pythonPath: string;
  private readonly target?: string;
  private readonly runner: CommandRunner;

  constructor(options: PipInstallerOptions) {
    this.pythonPath = options.pythonPath;
    this.target = options.target;
    this.runner = options.runner ?? execFileRunner;
  }

  /**
   * pip 명령 인자 생성
   */
  buildArgs(artifactPath: string, options: InstallOptions): string[] {
    const args = ['-m', 'pip', 'install', '--no-deps', '--no-index', '--disable-pip-version-check'];
    if (options.overwrite) {
      args.push('--force-reinstall');
    }
    if (this.target) {
      args.push('--target', this.target);
      if (options.overwrite) args.push('--upgrade');
    }
    args.push(artifactPath);
    return args;
  }

  async install(artifactPath: string, options: InstallOptions): Promise<void> {
    const args = this.buildArgs(artifactPath, options);
    logger.debug('pip 설치 실행', { python: this.pythonPath, args });

    let result: CommandResult;
    try {
      result = await this.runner(this.pythonPath, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InstallError(`pip 실행 실패: ${message}`, artifactPath);
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `pip 종료 코드 ${result.exitCode}`;
      throw new InstallError(detail, artifactPath);
    }
  }
}
