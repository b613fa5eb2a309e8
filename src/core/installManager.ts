import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import { BatchReport, Outcome, OutcomeKind, Requirement } from '../types';
import logger from '../utils/logger';
import { RequirementPipeline } from './requirementPipeline';
import { formatRequirement } from './shared/requirements';

// 이벤트 타입
export interface InstallManagerEvents {
  itemStart: (requirement: Requirement) => void;
  itemComplete: (outcome: Outcome) => void;
  itemFailed: (outcome: Outcome) => void;
  allComplete: (report: BatchReport) => void;
}

export interface InstallManagerOptions {
  /** 동시에 진행할 파이프라인 수 */
  concurrency?: number;
}

export type OutcomeSummary = Record<OutcomeKind, number>;

/**
 * 결과 종류별 개수
 */
export function summarize(report: BatchReport): OutcomeSummary {
  const summary: OutcomeSummary = {
    installed: 0,
    missing: 0,
    'no-compatible-artifact': 0,
    'transport-failure': 0,
    'install-failure': 0,
  };
  for (const outcome of report) {
    summary[outcome.kind]++;
  }
  return summary;
}

/**
 * 표준 출력으로 내보낼 실패 목록 (입력 순서)
 */
export function failureLines(report: BatchReport): string[] {
  return report
    .filter((outcome) => outcome.kind !== 'installed')
    .map((outcome) => formatRequirement(outcome.requirement));
}

/**
 * 실패가 하나라도 있는지 여부
 */
export function hasFailures(report: BatchReport): boolean {
  return report.some((outcome) => outcome.kind !== 'installed');
}

/**
 * 배치 코디네이터
 * 요구사항마다 파이프라인을 하나씩 띄우고 모두 끝날 때까지 기다린다.
 */
export class InstallManager extends EventEmitter<InstallManagerEvents> {
  private readonly concurrency: number;
  private isRunning = false;

  constructor(
    private readonly pipeline: RequirementPipeline,
    options: InstallManagerOptions = {}
  ) {
    super();
    this.concurrency = options.concurrency ?? 8;
  }

  /**
   * 배치 실행
   * 완료 순서와 관계없이 결과는 입력 순서대로 반환한다.
   */
  async run(requirements: readonly Requirement[]): Promise<BatchReport> {
    if (this.isRunning) {
      throw new Error('설치가 이미 진행 중입니다');
    }

    this.isRunning = true;
    const startTime = Date.now();
    const queue = new PQueue({ concurrency: this.concurrency });

    logger.info('설치 시작', {
      count: requirements.length,
      concurrency: this.concurrency,
    });

    try {
      const report = await Promise.all(
        requirements.map((requirement) =>
          queue.add(() => this.runOne(requirement))
        )
      );

      const summary = summarize(report);
      logger.info('설치 완료', { ...summary, duration: Date.now() - startTime });
      this.emit('allComplete', report);
      return report;
    } finally {
      // 한 파이프라인이 예외로 끝나도 나머지가 모두 멈춘 뒤에 다음 실행을 허용
      await queue.onIdle();
      this.isRunning = false;
    }
  }

  private async runOne(requirement: Requirement): Promise<Outcome> {
    this.emit('itemStart', requirement);
    const outcome = await this.pipeline.run(requirement);

    if (outcome.kind === 'installed') {
      logger.info('패키지 설치 완료', {
        name: requirement.name,
        filename: outcome.filename,
      });
      this.emit('itemComplete', outcome);
    } else {
      logger.warn('패키지 설치 실패', {
        requirement: formatRequirement(requirement),
        kind: outcome.kind,
        ...('detail' in outcome ? { detail: outcome.detail } : {}),
      });
      this.emit('itemFailed', outcome);
    }

    return outcome;
  }

  get running(): boolean {
    return this.isRunning;
  }
}
