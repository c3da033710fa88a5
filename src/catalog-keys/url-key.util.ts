import { CATALOG_KEY_LIMITS, HASH_SUFFIX } from '../config/catalog-keys.config';
import {
  EDGE_SEPARATOR_REGEX,
  URL_KEY_CHARSET_REGEX,
} from '../common/constants/key-patterns.constants';
import { InvalidInputError } from '../common/errors/catalog-key.errors';
import { slugifyText } from '../common/slug/slug-normalizer.util';
import { truncateSlug } from '../common/slug/slug-truncate.util';
import { assertLengthBounds, assertMaxLength } from './key-bounds.util';

export interface UrlKeyOptions {
  minLen?: number;
  maxLen?: number;
}

// 웹 경로 세그먼트용 (밑줄 없음)
export function normalizeUrlKey(
  text: string | null | undefined,
  { maxLen = CATALOG_KEY_LIMITS.urlKeyMaxLength }: Pick<UrlKeyOptions, 'maxLen'> = {},
): string {
  assertMaxLength(maxLen);
  const slug = slugifyText(text);
  if (!slug) {
    throw new InvalidInputError(
      `url_key로 정규화할 수 있는 문자가 없습니다, text=${JSON.stringify(text ?? null)}`,
    );
  }
  return truncateSlug(slug, maxLen, HASH_SUFFIX.slugSeparator);
}

export function validateUrlKey(
  key: string | null | undefined,
  {
    minLen = CATALOG_KEY_LIMITS.idxMinLength,
    maxLen = CATALOG_KEY_LIMITS.urlKeyMaxLength,
  }: UrlKeyOptions = {},
): boolean {
  assertLengthBounds(minLen, maxLen);
  if (!key) return false;
  if (key.length < minLen || key.length > maxLen) return false;
  if (!URL_KEY_CHARSET_REGEX.test(key)) return false;
  return !EDGE_SEPARATOR_REGEX.test(key);
}
