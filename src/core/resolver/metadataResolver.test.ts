/**
 * metadataResolver.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import axios from 'axios';
import { TransportError } from '../errors';
import { isPyPIResponse } from '../shared/pip-types';
import {
  buildMetadataUrl,
  candidatesFor,
  MetadataResolver,
  toPackageMetadata,
} from './metadataResolver';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const JSON_HEADERS = { 'content-type': 'application/json' };

const pkgDocument = {
  info: { version: '1.0' },
  releases: {
    '1.0': [{ filename: 'pkg-1.0-py3-none-any.whl', url: 'http://x/pkg.whl' }],
  },
};

describe('metadataResolver', () => {
  let resolver: MetadataResolver;

  beforeEach(() => {
    mockedAxios.get.mockReset();
    mockedAxios.isAxiosError.mockReset();
    resolver = new MetadataResolver({ baseUrl: 'https://pypi.org/pypi' });
  });

  describe('buildMetadataUrl', () => {
    it('버전이 없으면 {name}/json', () => {
      expect(buildMetadataUrl('https://pypi.org/pypi/', 'requests', '')).toBe(
        'https://pypi.org/pypi/requests/json'
      );
    });

    it('버전이 있으면 {name}/{version}/json', () => {
      expect(buildMetadataUrl('https://pypi.org/pypi', 'requests', '2.31.0')).toBe(
        'https://pypi.org/pypi/requests/2.31.0/json'
      );
    });
  });

  describe('resolve', () => {
    it('메타데이터 문서를 PackageMetadata로 변환', async () => {
      mockedAxios.get.mockResolvedValueOnce({ data: pkgDocument, headers: JSON_HEADERS });

      const metadata = await resolver.resolve('pkg', '');

      expect(metadata).toEqual({
        latestVersion: '1.0',
        releasesByVersion: {
          '1.0': [{ filename: 'pkg-1.0-py3-none-any.whl', downloadUrl: 'http://x/pkg.whl' }],
        },
      });
      expect(mockedAxios.get).toHaveBeenCalledWith(
        'https://pypi.org/pypi/pkg/json',
        expect.any(Object)
      );
    });

    it('버전 지정 조회 경로 사용', async () => {
      mockedAxios.get.mockResolvedValueOnce({ data: pkgDocument, headers: JSON_HEADERS });

      await resolver.resolve('pkg', '1.0');

      expect(mockedAxios.get).toHaveBeenCalledWith(
        'https://pypi.org/pypi/pkg/1.0/json',
        expect.any(Object)
      );
    });

    it('HTML 응답은 null', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        data: '<html><body>Not Found</body></html>',
        headers: { 'content-type': 'text/html; charset=utf-8' },
      });

      expect(await resolver.resolve('ghost', '')).toBeNull();
    });

    it('JSON이지만 메타데이터 형식이 아니면 null', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        data: { message: 'Not Found' },
        headers: JSON_HEADERS,
      });

      expect(await resolver.resolve('ghost', '')).toBeNull();
    });

    it('404 에러 시 null 반환', async () => {
      const error = { isAxiosError: true, response: { status: 404 } };
      mockedAxios.get.mockRejectedValueOnce(error);
      mockedAxios.isAxiosError.mockReturnValue(true);

      expect(await resolver.resolve('ghost', '')).toBeNull();
    });

    it('응답 없이 실패하면 TransportError', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:443'));
      mockedAxios.isAxiosError.mockReturnValue(true);

      await expect(resolver.resolve('pkg', '')).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('toPackageMetadata', () => {
    it('버전 조회 응답의 urls로 파일 목록 보충', () => {
      const metadata = toPackageMetadata({
        info: { version: '2.0' },
        releases: {},
        urls: [{ filename: 'foo-2.0-py3-none-any.whl', url: 'http://x/foo.whl' }],
      });

      expect(metadata.releasesByVersion['2.0']).toEqual([
        { filename: 'foo-2.0-py3-none-any.whl', downloadUrl: 'http://x/foo.whl' },
      ]);
    });

    it('__proto__ 버전 키도 일반 버전으로 취급', () => {
      const document: unknown = JSON.parse(
        '{"info":{"version":"1.0"},"releases":{"__proto__":[{"filename":"odd-0.1-py3-none-any.whl","url":"http://x/odd.whl"}]}}'
      );
      if (!isPyPIResponse(document)) throw new Error('메타데이터 문서가 아님');

      const metadata = toPackageMetadata(document);

      expect(Object.getPrototypeOf(metadata.releasesByVersion)).toBe(Object.prototype);
      expect(candidatesFor(metadata, '__proto__')).toEqual([
        { filename: 'odd-0.1-py3-none-any.whl', downloadUrl: 'http://x/odd.whl' },
      ]);
      expect(candidatesFor(metadata, '')).toBeNull();
    });
  });

  describe('candidatesFor', () => {
    const metadata = toPackageMetadata({
      info: { version: '2.0' },
      releases: {
        '1.0': [{ filename: 'foo-1.0-py3-none-any.whl', url: 'http://x/foo-1.whl' }],
        '2.0': [{ filename: 'foo-2.0-py3-none-any.whl', url: 'http://x/foo-2.whl' }],
      },
    });

    it('버전 미지정 시 현재 버전', () => {
      expect(candidatesFor(metadata, '')?.[0].filename).toBe('foo-2.0-py3-none-any.whl');
    });

    it('지정 버전 사용', () => {
      expect(candidatesFor(metadata, '1.0')?.[0].filename).toBe('foo-1.0-py3-none-any.whl');
    });

    it('없는 버전은 null', () => {
      expect(candidatesFor(metadata, '9.9')).toBeNull();
    });

    it('Object 기본 속성 이름의 버전은 null', () => {
      expect(candidatesFor(metadata, 'constructor')).toBeNull();
      expect(candidatesFor(metadata, 'toString')).toBeNull();
      expect(candidatesFor(metadata, '__proto__')).toBeNull();
    });
  });
});
