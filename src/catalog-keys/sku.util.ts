import { CATALOG_KEY_LIMITS, HASH_SUFFIX } from '../config/catalog-keys.config';
import { SKU_CHARSET_REGEX } from '../common/constants/key-patterns.constants';
import { InvalidInputError } from '../common/errors/catalog-key.errors';
import { slugifyText } from '../common/slug/slug-normalizer.util';
import { truncateSlug } from '../common/slug/slug-truncate.util';
import { assertLengthBounds, assertMaxLength } from './key-bounds.util';

export interface SkuOptions {
  maxLen?: number;
}

/**
 * PIM 상품 SKU 정규화. 결과는 `[a-z0-9-]`만 포함하며,
 * 잘릴 때도 밑줄 대신 하이픈으로 해시를 붙인다.
 */
export function normalizeSku(
  text: string | null | undefined,
  { maxLen = CATALOG_KEY_LIMITS.skuMaxLength }: SkuOptions = {},
): string {
  assertMaxLength(maxLen);
  const slug = slugifyText(text);
  if (!slug) {
    throw new InvalidInputError(
      `SKU로 정규화할 수 있는 문자가 없습니다, text=${JSON.stringify(text ?? null)}`,
    );
  }
  return truncateSlug(slug, maxLen, HASH_SUFFIX.slugSeparator);
}

/**
 * 대소문자는 허용하되 `[A-Za-z0-9-]` 외 문자가 있거나 길이를 넘으면 false.
 * 내용 문제로는 던지지 않는다.
 */
export function validateSku(
  sku: string | null | undefined,
  { maxLen = CATALOG_KEY_LIMITS.skuMaxLength }: SkuOptions = {},
): boolean {
  assertLengthBounds(0, maxLen);
  if (!sku) return false;
  if (sku.length > maxLen) return false;
  return SKU_CHARSET_REGEX.test(sku);
}
