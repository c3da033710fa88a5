import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CatalogKeysService } from '../../../src/catalog-keys/catalog-keys.service';
import {
  ErrorCodes,
  InvalidArgumentError,
  InvalidInputError,
} from '../../../src/common/errors/catalog-key.errors';

const createService = (env: Record<string, string> = {}) =>
  new CatalogKeysService(new ConfigService(env));

describe('CatalogKeysService', () => {
  let warnSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('설정', () => {
    it('환경변수가 없으면 기본 길이 128', () => {
      expect(createService().getLimits()).toEqual({
        idxMaxLength: 128,
        skuMaxLength: 128,
        urlKeyMaxLength: 128,
      });
    });

    it('환경변수로 기본 길이를 바꾼다', () => {
      const service = createService({ CATALOG_IDX_MAX_LENGTH: '40' });
      const result = service.normalize('idx', 'a'.repeat(100));

      expect(result.key).toHaveLength(40);
      expect(result.key).toMatch(/^a{31}_[0-9a-f]{8}$/);
      expect(result.truncated).toBe(true);
    });

    it('잘못된 값은 기본값으로 되돌리고 경고한다', () => {
      const service = createService({ CATALOG_SKU_MAX_LENGTH: 'abc' });

      expect(service.getLimits().skuMaxLength).toBe(128);
      expect(warnSpy).toHaveBeenCalledWith(
        'CATALOG_SKU_MAX_LENGTH 설정 경고: 양의 정수가 아니어서 기본값 128을 사용합니다 (abc)',
      );
    });

    it('상한을 넘으면 1024로 보정한다', () => {
      const service = createService({ CATALOG_URL_KEY_MAX_LENGTH: '5000' });

      expect(service.getLimits().urlKeyMaxLength).toBe(1024);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('normalize', () => {
    it('종류별로 정규화한다', () => {
      const service = createService();

      expect(service.normalize('idx', 'Premium Coffee Beans - Ethiopian Origin!')).toEqual({
        kind: 'idx',
        input: 'Premium Coffee Beans - Ethiopian Origin!',
        key: 'premium-coffee-beans-ethiopian-origin',
        truncated: false,
      });
      expect(service.normalize('sku', 'COFFEE-123-ABC DEF').key).toBe('coffee-123-abc-def');
      expect(service.normalize('ean', '123 456 789 012')).toEqual({
        kind: 'ean',
        input: '123 456 789 012',
        key: '123456789012',
        truncated: false,
      });
      expect(service.normalize('url_key', 'Premium Coffee & Tea Products').key).toBe(
        'premium-coffee-tea-products',
      );
    });

    it('요청의 maxLen이 설정값보다 우선한다', () => {
      const result = createService().normalize('url_key', 'b'.repeat(100), 20);

      expect(result.key).toMatch(/^b{11}-[0-9a-f]{8}$/);
      expect(result.truncated).toBe(true);
    });

    it('정규화할 문자가 없으면 InvalidInputError', () => {
      expect(() => createService().normalize('idx', '!!!')).toThrow(InvalidInputError);
    });
  });

  describe('validate', () => {
    it('idx 검증 실패를 결과로 돌려준다', () => {
      expect(createService().validate('idx', 'Bad Key')).toEqual({
        kind: 'idx',
        value: 'Bad Key',
        valid: false,
        code: ErrorCodes.VALIDATION_ERROR,
        reason: 'idx에는 [a-z0-9_-]만 쓸 수 있습니다. normalizeIdx()를 사용하세요, idx=Bad Key',
      });
    });

    it('boolean 검증 함수 결과도 같은 형태로 돌려준다', () => {
      const service = createService();

      expect(service.validate('sku', '')).toEqual({
        kind: 'sku',
        value: '',
        valid: false,
        code: ErrorCodes.VALIDATION_ERROR,
        reason: 'SKU는 1~128자의 [A-Za-z0-9-]여야 합니다',
      });
      expect(service.validate('ean', '12345').valid).toBe(false);
      expect(service.validate('url_key', 'tea_cups').valid).toBe(false);
    });

    it('통과하면 code/reason은 null', () => {
      expect(createService().validate('ean', '123456789012')).toEqual({
        kind: 'ean',
        value: '123456789012',
        valid: true,
        code: null,
        reason: null,
      });
    });
  });

  describe('normalizeMany', () => {
    it('실패 항목이 있어도 나머지를 처리하고 통계를 남긴다', () => {
      const result = createService().normalizeMany('sku', [
        'COFFEE-123-ABC DEF',
        '***',
        'Mug Large / Blue',
      ]);

      expect(result.total).toBe(3);
      expect(result.normalized).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.items.map((item) => item.key)).toEqual([
        'coffee-123-abc-def',
        null,
        'mug-large-blue',
      ]);
      expect(result.items[1].error?.code).toBe(ErrorCodes.INVALID_INPUT);
      expect(logSpy).toHaveBeenCalledWith(
        expect.stringMatching(
          /^sku 일괄 정규화 통계: total: 3, normalized: 2, failed: 1 - \d+ms$/,
        ),
      );
    });

    it('파라미터 오류는 배치 전체를 중단한다', () => {
      expect(() => createService().normalizeMany('idx', ['a', 'b'], 0)).toThrow(
        InvalidArgumentError,
      );
    });
  });
});
