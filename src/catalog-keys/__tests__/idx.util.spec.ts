import { normalizeIdx, validateIdx } from '../idx.util';
import {
  InvalidArgumentError,
  InvalidInputError,
  KeyValidationError,
} from '../../common/errors/catalog-key.errors';

const longText = 'a'.repeat(200);

describe('idx.util', () => {
  describe('normalizeIdx', () => {
    it('상품명을 idx로 정규화한다', () => {
      expect(normalizeIdx('Premium Coffee Beans - Ethiopian Origin!')).toBe(
        'premium-coffee-beans-ethiopian-origin',
      );
      expect(normalizeIdx('Example Cammel Name')).toBe('example-cammel-name');
    });

    it('유니코드 정규화 형태와 관계없이 같은 idx', () => {
      const text = 'Crème Brûlée 250g';
      expect(normalizeIdx(text.normalize('NFD'))).toBe('creme-brulee-250g');
      expect(normalizeIdx(text.normalize('NFC'))).toBe('creme-brulee-250g');
    });

    it('200자 입력을 max_len=50으로 자르면 50자 + _해시', () => {
      const idx = normalizeIdx(longText, 50);

      expect(idx).toHaveLength(50);
      expect(idx).toMatch(/^a{41}_[0-9a-f]{8}$/);
    });

    it('결과 길이는 항상 max_len 이하', () => {
      for (const maxLen of [1, 5, 8, 9, 10, 50, 128]) {
        expect(normalizeIdx(longText, maxLen).length).toBeLessThanOrEqual(maxLen);
      }
    });

    it('정규화 결과를 다시 정규화해도 같다 (잘리지 않은 경우)', () => {
      const inputs = ['Crème Brûlée 250g', 'COFFEE-123', '  Tea & Cups  '];
      for (const input of inputs) {
        const once = normalizeIdx(input);
        expect(normalizeIdx(once)).toBe(once);
      }
    });

    it('잘못된 max_len은 InvalidArgumentError', () => {
      expect(() => normalizeIdx('coffee', 0)).toThrow(InvalidArgumentError);
      expect(() => normalizeIdx('coffee', -5)).toThrow(InvalidArgumentError);
      expect(() => normalizeIdx('coffee', 1.5)).toThrow(InvalidArgumentError);
    });

    it('정규화할 문자가 없으면 InvalidInputError', () => {
      expect(() => normalizeIdx('')).toThrow(InvalidInputError);
      expect(() => normalizeIdx('!!! ---')).toThrow(InvalidInputError);
      expect(() => normalizeIdx(null)).toThrow(InvalidInputError);
    });
  });

  describe('validateIdx', () => {
    it('정규화 결과는 항상 검증을 통과한다', () => {
      const inputs = [
        'Premium Coffee Beans - Ethiopian Origin!',
        longText,
        'Crème Brûlée',
      ];
      for (const input of inputs) {
        expect(() => validateIdx(normalizeIdx(input))).not.toThrow();
      }
      expect(() => validateIdx(normalizeIdx(longText, 5), 1, 5)).not.toThrow();
    });

    it('허용 문자만 있으면 통과', () => {
      expect(() => validateIdx('abc')).not.toThrow();
      expect(() => validateIdx('coffee_1a2b3c4d')).not.toThrow();
      expect(() => validateIdx('a-b_c')).not.toThrow();
    });

    it('빈 문자열은 KeyValidationError', () => {
      expect(() => validateIdx('')).toThrow(KeyValidationError);
      expect(() => validateIdx(undefined)).toThrow(KeyValidationError);
    });

    it('허용되지 않는 문자나 양끝 구분자는 거부한다', () => {
      for (const idx of ['Abc', 'a b', 'a.b', '-abc', 'abc-', '_abc', 'abc_']) {
        expect(() => validateIdx(idx)).toThrow(KeyValidationError);
      }
    });

    it('길이 범위를 벗어나면 거부한다', () => {
      expect(() => validateIdx('abc', 4)).toThrow(KeyValidationError);
      expect(() => validateIdx('abcdef', 1, 5)).toThrow(KeyValidationError);
      expect(() => validateIdx('a'.repeat(129))).toThrow(KeyValidationError);
    });

    it('잘못된 길이 범위는 InvalidArgumentError', () => {
      expect(() => validateIdx('abc', 5, 2)).toThrow(InvalidArgumentError);
      expect(() => validateIdx('abc', -1)).toThrow(InvalidArgumentError);
      expect(() => validateIdx('abc', 1, -1)).toThrow(InvalidArgumentError);
    });

    it('에러에 코드가 담긴다', () => {
      let caught: unknown;
      try {
        validateIdx('');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(KeyValidationError);
      expect((caught as KeyValidationError).code).toBe('VALIDATION_ERROR');
    });
  });
});
