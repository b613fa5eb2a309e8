import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { ArtifactFetcher, FetchResult } from '../../types';
import logger from '../../utils/logger';

export interface FetcherOptions {
  /** 다운로드 타임아웃 (ms) */
  timeout?: number;
  userAgent?: string;
}

/**
 * 다운로드 실패 상세 메시지 생성
 */
export function describeFetchError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * 아티팩트 다운로더
 * 응답 본문을 스트림으로 받아 대상 경로에 덮어쓴다.
 */
export class Fetcher implements ArtifactFetcher {
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: FetcherOptions = {}) {
    this.timeout = options.timeout ?? 300000;
    this.userAgent = options.userAgent ?? 'wheelhouse/1.0';
  }

  async fetch(url: string, destinationPath: string): Promise<FetchResult> {
    logger.info(`Downloading ${url}`);

    try {
      const response = await axios.get<Readable>(url, {
        responseType: 'stream',
        timeout: this.timeout,
        headers: { 'User-Agent': this.userAgent },
      });

      await fs.ensureDir(path.dirname(destinationPath));
      await pipeline(response.data, fs.createWriteStream(destinationPath, { flags: 'w' }));

      const { size } = await fs.stat(destinationPath);
      logger.info(`Downloaded ${path.basename(destinationPath)}`, { bytes: size });
      return { ok: true, bytes: size };
    } catch (error) {
      const detail = describeFetchError(error);
      logger.error('아티팩트 다운로드 실패', { url, detail });
      return { ok: false, detail };
    }
  }
}
