import { createHash } from 'crypto';
import { HASH_SUFFIX } from '../../config/catalog-keys.config';
import { TRAILING_SEPARATORS_REGEX } from '../constants/key-patterns.constants';

/**
 * 슬러그 전체에 대한 md5 앞 8자리.
 */
export function slugFingerprint(slug: string): string {
  return createHash(HASH_SUFFIX.algorithm)
    .update(slug, 'utf8')
    .digest('hex')
    .slice(0, HASH_SUFFIX.length);
}

/**
 * 최대 길이를 넘는 슬러그를 `접두어 + 구분자 + 해시`로 줄인다.
 * - 해시는 원본 슬러그 전체로 계산하므로 접두어가 같은 긴 입력끼리도 결과가 갈린다
 * - maxLen이 구분자+해시(9자)보다 작으면 해시 앞부분만 반환
 * - 잘린 접두어 끝의 하이픈은 제거, 접두어가 비면 해시만 반환
 */
export function truncateSlug(
  slug: string,
  maxLen: number,
  separator: string = HASH_SUFFIX.idxSeparator,
): string {
  if (slug.length <= maxLen) return slug;

  const hash = slugFingerprint(slug);
  const reserved = separator.length + hash.length;
  if (maxLen < reserved) {
    return hash.slice(0, Math.max(0, maxLen));
  }

  const prefix = slug
    .slice(0, maxLen - reserved)
    .replace(TRAILING_SEPARATORS_REGEX, '');
  if (!prefix) return hash;

  return `${prefix}${separator}${hash}`;
}
