import { CATALOG_KEY_LIMITS, HASH_SUFFIX } from '../config/catalog-keys.config';
import {
  EDGE_SEPARATOR_REGEX,
  IDX_CHARSET_REGEX,
} from '../common/constants/key-patterns.constants';
import {
  InvalidInputError,
  KeyValidationError,
} from '../common/errors/catalog-key.errors';
import { slugifyText } from '../common/slug/slug-normalizer.util';
import { truncateSlug } from '../common/slug/slug-truncate.util';
import { assertLengthBounds, assertMaxLength } from './key-bounds.util';

/**
 * 범용 식별자(idx) 생성: 슬러그화 후 maxLen을 넘으면 `_해시`로 자른다.
 *
 * @throws InvalidArgumentError maxLen이 양의 정수가 아닐 때
 * @throws InvalidInputError 정규화할 문자가 하나도 없을 때
 */
export function normalizeIdx(
  text: string | null | undefined,
  maxLen: number = CATALOG_KEY_LIMITS.idxMaxLength,
): string {
  assertMaxLength(maxLen);
  const slug = slugifyText(text);
  if (!slug) {
    throw new InvalidInputError(
      `idx로 정규화할 수 있는 문자가 없습니다, text=${JSON.stringify(text ?? null)}`,
    );
  }
  return truncateSlug(slug, maxLen, HASH_SUFFIX.idxSeparator);
}

/**
 * idx 형식 검증. 통과하면 아무것도 반환하지 않고, 실패하면 던진다.
 * (validateSku/validateEan/validateUrlKey는 boolean을 반환한다)
 */
export function validateIdx(
  idx: string | null | undefined,
  minLen: number = CATALOG_KEY_LIMITS.idxMinLength,
  maxLen: number = CATALOG_KEY_LIMITS.idxMaxLength,
): void {
  assertLengthBounds(minLen, maxLen);

  if (!idx) {
    throw new KeyValidationError('idx는 비어 있을 수 없습니다');
  }
  if (idx.length < minLen) {
    throw new KeyValidationError(`idx는 최소 ${minLen}자여야 합니다, idx=${idx}`);
  }
  if (idx.length > maxLen) {
    throw new KeyValidationError(`idx는 최대 ${maxLen}자입니다, idx=${idx}`);
  }
  if (!IDX_CHARSET_REGEX.test(idx)) {
    throw new KeyValidationError(
      `idx에는 [a-z0-9_-]만 쓸 수 있습니다. normalizeIdx()를 사용하세요, idx=${idx}`,
    );
  }
  if (EDGE_SEPARATOR_REGEX.test(idx)) {
    throw new KeyValidationError(
      `idx는 '-' 또는 '_'로 시작하거나 끝날 수 없습니다, idx=${idx}`,
    );
  }
}
