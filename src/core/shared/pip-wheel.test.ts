import { describe, it, expect } from 'vitest';
import { ArtifactRecord } from '../../types';
import { CompatibilityTag, parseTag } from './pip-tags';
import {
  computeRank,
  expandTags,
  isWheelFile,
  normalizePackageName,
  parseArtifact,
  rankArtifacts,
  selectBest,
} from './pip-wheel';

const tags = (...values: string[]): CompatibilityTag[] =>
  values.map((value) => {
    const parsed = parseTag(value);
    if (!parsed) throw new Error(`잘못된 태그: ${value}`);
    return parsed;
  });

const record = (filename: string): ArtifactRecord => ({
  filename,
  downloadUrl: `https://files.example.test/${filename}`,
});

describe('pip-wheel', () => {
  describe('normalizePackageName', () => {
    it('PEP 503 정규화', () => {
      expect(normalizePackageName('Foo_Bar.baz')).toBe('foo-bar-baz');
      expect(normalizePackageName('requests')).toBe('requests');
    });
  });

  describe('isWheelFile', () => {
    it('확장자로 판별', () => {
      expect(isWheelFile('pkg-1.0-py3-none-any.whl')).toBe(true);
      expect(isWheelFile('pkg-1.0.tar.gz')).toBe(false);
      expect(isWheelFile('pkg-1.0.zip')).toBe(false);
    });
  });

  describe('expandTags', () => {
    it('압축 태그셋 확장', () => {
      expect(expandTags('py2.py3', 'none', 'any')).toEqual([
        { runtimeTag: 'py2', abiTag: 'none', platformTag: 'any' },
        { runtimeTag: 'py3', abiTag: 'none', platformTag: 'any' },
      ]);
    });
  });

  describe('parseArtifact', () => {
    it('기본 wheel 파일명 파싱', () => {
      const descriptor = parseArtifact(
        { filename: 'pkg-1.0-py3-none-any.whl', downloadUrl: 'http://x/pkg.whl' },
        tags('py3-none-any')
      );

      expect(descriptor).not.toBeNull();
      expect(descriptor?.name).toBe('pkg');
      expect(descriptor?.version).toBe('1.0');
      expect(descriptor?.runtimeTag).toBe('py3');
      expect(descriptor?.abiTag).toBe('none');
      expect(descriptor?.platformTag).toBe('any');
      expect(descriptor?.buildTag).toBeUndefined();
      expect(descriptor?.rank).toBe(0);
    });

    it('빌드 태그 파싱', () => {
      const descriptor = parseArtifact(record('pkg-1.0-2b-py3-none-any.whl'), tags('py3-none-any'));
      expect(descriptor?.buildTag).toEqual([2, 'b']);
      expect(descriptor?.version).toBe('1.0');
    });

    it('플랫폼 태그셋이 여러 개인 wheel', () => {
      const descriptor = parseArtifact(
        record('numpy-1.26.0-cp311-cp311-manylinux_2_17_x86_64.manylinux2014_x86_64.whl'),
        tags('cp311-cp311-manylinux2014_x86_64')
      );
      expect(descriptor?.expandedTags).toHaveLength(2);
      expect(descriptor?.rank).toBe(0);
    });

    it('sdist는 디스크립터가 되지 않음', () => {
      expect(parseArtifact(record('pkg-1.0.tar.gz'), tags('py3-none-any'))).toBeNull();
    });

    it('태그 구조가 맞지 않으면 null', () => {
      expect(parseArtifact(record('pkg-1.0-py3-none.whl'), tags('py3-none-any'))).toBeNull();
      expect(parseArtifact(record('pkg-1.0-py3.-none-any.whl'), tags('py3-none-any'))).toBeNull();
    });

    it('호환되지 않으면 rank -1', () => {
      const descriptor = parseArtifact(record('pkg-1.0-cp311-cp311-win_amd64.whl'), tags('py3-none-any'));
      expect(descriptor?.rank).toBe(-1);
    });
  });

  describe('computeRank', () => {
    it('펼친 태그 중 가장 낮은 인덱스', () => {
      const supported = tags('py3-none-any', 'py2-none-any');
      expect(computeRank(expandTags('py2.py3', 'none', 'any'), supported)).toBe(0);
      expect(computeRank(expandTags('py2', 'none', 'any'), supported)).toBe(1);
      expect(computeRank(expandTags('cp27', 'cp27mu', 'any'), supported)).toBe(-1);
    });
  });

  describe('rankArtifacts', () => {
    const supported = tags('cp311-cp311-manylinux_2_17_x86_64', 'py3-none-any');

    it('순위 오름차순, 설치 불가는 뒤로, sdist는 제외', () => {
      const ranked = rankArtifacts(
        [
          record('pkg-1.0-py3-none-any.whl'),
          record('pkg-1.0-cp311-cp311-win_amd64.whl'),
          record('pkg-1.0.tar.gz'),
          record('pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl'),
        ],
        supported
      );

      expect(ranked.map((d) => d.record.filename)).toEqual([
        'pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl',
        'pkg-1.0-py3-none-any.whl',
        'pkg-1.0-cp311-cp311-win_amd64.whl',
      ]);
      expect(ranked.map((d) => d.rank)).toEqual([0, 1, -1]);
    });
  });

  describe('selectBest', () => {
    const supported = tags('cp311-cp311-manylinux_2_17_x86_64', 'py3-none-any');

    it('가장 높은 순위의 설치 가능한 아티팩트 선택', () => {
      const winner = selectBest(
        [
          record('pkg-1.0-py3-none-any.whl'),
          record('pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl'),
        ],
        supported
      );
      expect(winner?.filename).toBe('pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl');
    });

    it('같은 순위는 입력 순서 유지', () => {
      const first = record('pkg-1.0-1-py3-none-any.whl');
      const second = record('pkg-1.0-py3-none-any.whl');

      expect(selectBest([first, second], supported)).toBe(first);
      expect(selectBest([second, first], supported)).toBe(second);
    });

    it('반복 호출해도 같은 결과', () => {
      const candidates = [
        record('pkg-1.0-cp311-cp311-win_amd64.whl'),
        record('pkg-1.0-py3-none-any.whl'),
        record('pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl'),
      ];
      const a = selectBest(candidates, supported);
      const b = selectBest(candidates, supported);
      expect(a).toBe(b);
      expect(a?.filename).toBe('pkg-1.0-cp311-cp311-manylinux_2_17_x86_64.whl');
    });

    it('sdist만 있으면 null', () => {
      expect(selectBest([record('pkg-1.0.tar.gz'), record('pkg-1.0.zip')], supported)).toBeNull();
    });

    it('빈 목록은 null', () => {
      expect(selectBest([], supported)).toBeNull();
    });

    it('모두 다른 플랫폼이면 null', () => {
      expect(
        selectBest(
          [record('bar-1.0-cp311-cp311-win_amd64.whl'), record('bar-1.0-cp311-cp311-macosx_11_0_arm64.whl')],
          supported
        )
      ).toBeNull();
    });

    it('와일드카드 환경은 무엇이든 허용', () => {
      const winner = selectBest([record('pkg-1.0-cp39-cp39-win32.whl')], tags('*-*-*'));
      expect(winner?.filename).toBe('pkg-1.0-cp39-cp39-win32.whl');
    });
  });
});
