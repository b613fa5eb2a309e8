/**
 * 파이프라인 테스트용 인메모리 협력자
 * 네트워크나 pip 없이 조회/다운로드/설치 흐름을 재현한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import {
  ArtifactFetcher,
  FetchResult,
  Installer,
  InstallOptions,
  MetadataSource,
  PackageMetadata,
} from '../types';
import { InstallError } from '../core/errors';

export interface FakePackage {
  latest: string;
  /** 버전별 파일명 목록 */
  releases: Record<string, string[]>;
}

export const artifactUrl = (filename: string): string => `https://files.example.test/${filename}`;

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * 인덱스 대역
 * 없는 패키지나 없는 버전은 null (인덱스의 404와 같은 취급)
 */
export class FakeIndex implements MetadataSource {
  readonly lookups: string[] = [];
  private readonly delays = new Map<string, number>();

  constructor(private readonly packages: Record<string, FakePackage>) {}

  /** 특정 패키지 조회를 지연시켜 완료 순서를 바꾼다 */
  delayFor(name: string, ms: number): this {
    this.delays.set(name, ms);
    return this;
  }

  async resolve(name: string, version: string): Promise<PackageMetadata | null> {
    this.lookups.push(version ? `${name}==${version}` : name);
    await delay(this.delays.get(name) ?? 0);

    if (!Object.hasOwn(this.packages, name)) return null;
    const pkg = this.packages[name];
    if (version && !Object.hasOwn(pkg.releases, version)) return null;

    const releasesByVersion: PackageMetadata['releasesByVersion'] = {};
    for (const [ver, filenames] of Object.entries(pkg.releases)) {
      releasesByVersion[ver] = filenames.map((filename) => ({
        filename,
        downloadUrl: artifactUrl(filename),
      }));
    }
    return { latestVersion: version || pkg.latest, releasesByVersion };
  }
}

/**
 * 다운로드 대역
 * 대상 경로에 파일명을 내용으로 기록한다.
 */
export class FakeFetcher implements ArtifactFetcher {
  readonly fetched: string[] = [];
  readonly destinations: string[] = [];
  private readonly failures = new Map<string, string>();

  failOn(url: string, detail: string): this {
    this.failures.set(url, detail);
    return this;
  }

  async fetch(url: string, destinationPath: string): Promise<FetchResult> {
    this.fetched.push(url);
    this.destinations.push(destinationPath);

    const detail = this.failures.get(url);
    if (detail !== undefined) {
      return { ok: false, detail };
    }

    const content = path.basename(destinationPath);
    await fs.outputFile(destinationPath, content);
    return { ok: true, bytes: Buffer.byteLength(content) };
  }
}

/**
 * 인스톨러 대역
 * 설치 시점에 파일이 존재하는지 함께 기록한다.
 */
export class FakeInstaller implements Installer {
  readonly installed: { path: string; existed: boolean; overwrite: boolean }[] = [];
  private readonly rejected = new Map<string, string>();

  rejectFile(filename: string, message: string): this {
    this.rejected.set(filename, message);
    return this;
  }

  async install(artifactPath: string, options: InstallOptions): Promise<void> {
    const existed = await fs.pathExists(artifactPath);
    this.installed.push({ path: artifactPath, existed, overwrite: options.overwrite });

    const message = this.rejected.get(path.basename(artifactPath));
    if (message !== undefined) {
      throw new InstallError(message, artifactPath);
    }
  }
}
