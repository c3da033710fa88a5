import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CATALOG_KEY_ENV,
  CATALOG_KEY_LIMITS,
} from '../config/catalog-keys.config';
import {
  ErrorCodes,
  InvalidInputError,
  KeyValidationError,
} from '../common/errors/catalog-key.errors';
import { slugifyText } from '../common/slug/slug-normalizer.util';
import { LoggerHelper } from '../common/utils/logger.helper';
import { normalizeEan, validateEan } from './ean.util';
import { normalizeIdx, validateIdx } from './idx.util';
import { normalizeSku, validateSku } from './sku.util';
import { normalizeUrlKey, validateUrlKey } from './url-key.util';
import {
  BatchNormalizeItem,
  BatchNormalizeResult,
  CatalogKeyKind,
  CatalogKeyLimits,
  KeyValidationResult,
  NormalizedKeyResult,
} from './catalog-keys.types';

/**
 * CatalogKeysService
 * - 키 종류별 정규화/검증 함수를 하나의 진입점으로 묶는다.
 * - 기본 최대 길이는 환경변수로 조정한다.
 * - raise/boolean 두 가지 검증 규약을 KeyValidationResult 하나로 합쳐 돌려준다.
 */
@Injectable()
export class CatalogKeysService {
  private readonly logger = new Logger(CatalogKeysService.name);
  private readonly limits: CatalogKeyLimits;

  constructor(private readonly configService: ConfigService) {
    this.limits = {
      idxMaxLength: this.readLength(
        CATALOG_KEY_ENV.idxMaxLength,
        CATALOG_KEY_LIMITS.idxMaxLength,
      ),
      skuMaxLength: this.readLength(
        CATALOG_KEY_ENV.skuMaxLength,
        CATALOG_KEY_LIMITS.skuMaxLength,
      ),
      urlKeyMaxLength: this.readLength(
        CATALOG_KEY_ENV.urlKeyMaxLength,
        CATALOG_KEY_LIMITS.urlKeyMaxLength,
      ),
    };
  }

  getLimits(): CatalogKeyLimits {
    return { ...this.limits };
  }

  normalize(
    kind: CatalogKeyKind,
    text: string,
    maxLen?: number,
  ): NormalizedKeyResult {
    const key = this.normalizeByKind(kind, text, maxLen);
    const truncated = kind !== 'ean' && key !== slugifyText(text);
    if (truncated) {
      this.logger.debug(
        `${kind} 길이 초과로 해시 접미사 적용: ${key} (원본 ${text.length}자)`,
      );
    }
    return { kind, input: text, key, truncated };
  }

  validate(kind: CatalogKeyKind, value: string): KeyValidationResult {
    const ok: KeyValidationResult = {
      kind,
      value,
      valid: true,
      code: null,
      reason: null,
    };

    switch (kind) {
      case 'idx':
        try {
          validateIdx(
            value,
            CATALOG_KEY_LIMITS.idxMinLength,
            this.limits.idxMaxLength,
          );
          return ok;
        } catch (error) {
          if (error instanceof KeyValidationError) {
            return this.invalid(kind, value, error.message);
          }
          throw error;
        }
      case 'sku':
        return validateSku(value, { maxLen: this.limits.skuMaxLength })
          ? ok
          : this.invalid(
              kind,
              value,
              `SKU는 1~${this.limits.skuMaxLength}자의 [A-Za-z0-9-]여야 합니다`,
            );
      case 'ean':
        return validateEan(value)
          ? ok
          : this.invalid(kind, value, 'EAN은 8/12/13/14자리 숫자여야 합니다');
      case 'url_key':
        return validateUrlKey(value, { maxLen: this.limits.urlKeyMaxLength })
          ? ok
          : this.invalid(
              kind,
              value,
              `url_key는 1~${this.limits.urlKeyMaxLength}자의 [a-z0-9-]이며 하이픈으로 시작/끝날 수 없습니다`,
            );
    }
  }

  /**
   * 여러 입력을 한 번에 정규화한다.
   * 입력 하나가 비어 있어도 나머지는 계속 처리하고, 파라미터 오류는 그대로 던진다.
   */
  normalizeMany(
    kind: CatalogKeyKind,
    texts: string[],
    maxLen?: number,
  ): BatchNormalizeResult {
    const t0 = Date.now();
    const items = texts.map((input): BatchNormalizeItem => {
      try {
        const key = this.normalizeByKind(kind, input, maxLen);
        return { input, key, error: null };
      } catch (error) {
        if (error instanceof InvalidInputError) {
          return {
            input,
            key: null,
            error: { code: error.code, message: error.message },
          };
        }
        throw error;
      }
    });

    const failed = items.filter((item) => item.error !== null).length;
    const result: BatchNormalizeResult = {
      kind,
      total: items.length,
      normalized: items.length - failed,
      failed,
      items,
    };

    LoggerHelper.logStats(
      this.logger,
      `${kind} 일괄 정규화`,
      { total: result.total, normalized: result.normalized, failed },
      Date.now() - t0,
    );
    return result;
  }

  private normalizeByKind(
    kind: CatalogKeyKind,
    text: string,
    maxLen?: number,
  ): string {
    switch (kind) {
      case 'idx':
        return normalizeIdx(text, maxLen ?? this.limits.idxMaxLength);
      case 'sku':
        return normalizeSku(text, {
          maxLen: maxLen ?? this.limits.skuMaxLength,
        });
      case 'ean':
        return normalizeEan(text);
      case 'url_key':
        return normalizeUrlKey(text, {
          maxLen: maxLen ?? this.limits.urlKeyMaxLength,
        });
    }
  }

  private invalid(
    kind: CatalogKeyKind,
    value: string,
    reason: string,
  ): KeyValidationResult {
    return { kind, value, valid: false, code: ErrorCodes.VALIDATION_ERROR, reason };
  }

  private readLength(envKey: string, fallback: number): number {
    const raw = this.configService.get<string>(envKey);
    if (raw === undefined || raw === '') return fallback;

    const configured = Number(raw);
    if (!Number.isInteger(configured) || configured <= 0) {
      LoggerHelper.logWarning(
        this.logger,
        `${envKey} 설정`,
        `양의 정수가 아니어서 기본값 ${fallback}을 사용합니다`,
        raw,
      );
      return fallback;
    }
    if (configured > CATALOG_KEY_LIMITS.hardMaxLength) {
      LoggerHelper.logWarning(
        this.logger,
        `${envKey} 설정`,
        `상한 ${CATALOG_KEY_LIMITS.hardMaxLength}을 넘어 보정합니다`,
        configured,
      );
      return CATALOG_KEY_LIMITS.hardMaxLength;
    }
    return configured;
  }
}
