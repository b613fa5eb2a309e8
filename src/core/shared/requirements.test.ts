import { describe, it, expect } from 'vitest';
import { RequirementParseError } from '../errors';
import { formatRequirement, parseRequirementLine, parseRequirements } from './requirements';

describe('requirements', () => {
  describe('parseRequirements', () => {
    it('이름과 고정 버전 파싱', () => {
      const content = [
        'requests',
        'flask==2.0.1',
        '',
        '  numpy == 1.26.0  ',
        '# 주석',
        'six==1.16.0 # pinned',
      ].join('\n');

      expect(parseRequirements(content)).toEqual([
        { name: 'requests', version: '' },
        { name: 'flask', version: '2.0.1' },
        { name: 'numpy', version: '1.26.0' },
        { name: 'six', version: '1.16.0' },
      ]);
    });

    it('CRLF 줄바꿈 처리', () => {
      expect(parseRequirements('attrs\r\nidna==3.6\r\n')).toEqual([
        { name: 'attrs', version: '' },
        { name: 'idna', version: '3.6' },
      ]);
    });

    it('빈 파일은 빈 목록', () => {
      expect(parseRequirements('\n   \n')).toEqual([]);
    });

    it('지원하지 않는 연산자는 줄 번호와 함께 에러', () => {
      let caught: unknown;
      try {
        parseRequirements('requests\nfoo>=1.0\n');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RequirementParseError);
      if (caught instanceof RequirementParseError) {
        expect(caught.line).toBe(2);
        expect(caught.message).toBe("2번째 줄: 잘못된 패키지명: 'foo>=1.0'");
      }
    });
  });

  describe('parseRequirementLine', () => {
    it('빈 버전 지정은 에러', () => {
      expect(() => parseRequirementLine('foo==', 1)).toThrow(RequirementParseError);
    });

    it('이름 없는 버전 지정은 에러', () => {
      expect(() => parseRequirementLine('==1.0', 3)).toThrow('3번째 줄');
    });

    it('이름 양쪽 공백 제거', () => {
      expect(parseRequirementLine('zope.interface == 5.0', 1)).toEqual({
        name: 'zope.interface',
        version: '5.0',
      });
    });
  });

  describe('formatRequirement', () => {
    it('버전 없으면 이름만', () => {
      expect(formatRequirement({ name: 'ghost', version: '' })).toBe('ghost');
    });

    it('버전 있으면 name==version', () => {
      expect(formatRequirement({ name: 'foo', version: '9.9' })).toBe('foo==9.9');
    });
  });
});
