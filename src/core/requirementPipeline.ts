import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  ArtifactFetcher,
  ArtifactRecord,
  Installer,
  MetadataSource,
  Outcome,
  PackageMetadata,
  Requirement,
} from '../types';
import logger from '../utils/logger';
import { errorMessage, InstallError, TransportError } from './errors';
import { LocalEnvironment } from './shared/pip-tags';
import { selectBest } from './shared/pip-wheel';
import { candidatesFor } from './resolver/metadataResolver';

/** 파이프라인 상태 (역방향 전이 없음) */
export type PipelineState = 'resolving' | 'selecting' | 'fetching' | 'installing' | 'done';

export interface PipelineDependencies {
  resolver: MetadataSource;
  fetcher: ArtifactFetcher;
  installer: Installer;
  /** 읽기 전용 로컬 환경 (모든 파이프라인이 공유) */
  environment: LocalEnvironment;
  /** 임시 디렉토리 상위 경로 (기본: os.tmpdir()) */
  tempRoot?: string;
  onStateChange?: (requirement: Requirement, state: PipelineState) => void;
}

/**
 * 요구사항 하나를 처리하는 파이프라인
 * 조회 -> 선택 -> 다운로드 -> 설치 순서로 진행하고 결과를 데이터로 반환한다.
 */
export class RequirementPipeline {
  constructor(private readonly deps: PipelineDependencies) {}

  async run(requirement: Requirement): Promise<Outcome> {
    const { name, version } = requirement;

    this.enter(requirement, 'resolving');
    let metadata: PackageMetadata | null;
    try {
      metadata = await this.deps.resolver.resolve(name, version);
    } catch (error) {
      if (error instanceof TransportError) {
        return this.finish(requirement, { kind: 'transport-failure', requirement, detail: error.message });
      }
      throw error;
    }

    const candidates = metadata ? candidatesFor(metadata, version) : null;
    if (!metadata || !candidates) {
      return this.finish(requirement, { kind: 'missing', requirement });
    }

    this.enter(requirement, 'selecting');
    const resolvedVersion = version || metadata.latestVersion;
    const winner = selectBest(candidates, this.deps.environment.tags);
    if (!winner) {
      return this.finish(requirement, {
        kind: 'no-compatible-artifact',
        requirement,
        version: resolvedVersion,
      });
    }
    logger.debug('아티팩트 선택', { name, version: resolvedVersion, filename: winner.filename });

    this.enter(requirement, 'fetching');
    let dir: string;
    try {
      dir = await this.createTempDir();
    } catch (error) {
      logger.error('임시 디렉토리 생성 실패', { name, error: errorMessage(error) });
      return this.finish(requirement, { kind: 'transport-failure', requirement, detail: errorMessage(error) });
    }

    let outcome: Outcome;
    try {
      outcome = await this.fetchAndInstall(requirement, winner, dir);
    } finally {
      await this.removeTempDir(requirement, dir);
    }
    return this.finish(requirement, outcome);
  }

  private async fetchAndInstall(
    requirement: Requirement,
    winner: ArtifactRecord,
    dir: string
  ): Promise<Outcome> {
    const artifactPath = path.join(dir, path.basename(winner.filename));
    const fetched = await this.deps.fetcher.fetch(winner.downloadUrl, artifactPath);
    if (!fetched.ok) {
      return { kind: 'transport-failure', requirement, detail: fetched.detail };
    }

    this.enter(requirement, 'installing');
    try {
      await this.deps.installer.install(artifactPath, { overwrite: true });
    } catch (error) {
      if (error instanceof InstallError) {
        return { kind: 'install-failure', requirement, detail: error.message };
      }
      throw error;
    }

    return { kind: 'installed', requirement, filename: winner.filename };
  }

  /**
   * 요구사항 전용 임시 디렉토리 생성
   */
  private async createTempDir(): Promise<string> {
    const root = this.deps.tempRoot ?? os.tmpdir();
    await fs.ensureDir(root);
    return fs.mkdtemp(path.join(root, 'wheelhouse-'));
  }

  /**
   * 임시 디렉토리 삭제 (실패해도 결과는 바꾸지 않음)
   */
  private async removeTempDir(requirement: Requirement, dir: string): Promise<void> {
    try {
      await fs.remove(dir);
    } catch (error) {
      logger.warn('임시 디렉토리 삭제 실패', {
        name: requirement.name,
        dir,
        error: errorMessage(error),
      });
    }
  }

  private enter(requirement: Requirement, state: PipelineState): void {
    this.deps.onStateChange?.(requirement, state);
  }

  private finish(requirement: Requirement, outcome: Outcome): Outcome {
    this.enter(requirement, 'done');
    return outcome;
  }
}
