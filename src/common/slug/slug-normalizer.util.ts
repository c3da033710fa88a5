import slugify from 'slugify';
import {
  EDGE_HYPHENS_REGEX,
  NON_WORD_RUN_REGEX,
  SLUG_DISALLOWED_RUN_REGEX,
} from '../constants/key-patterns.constants';

/**
 * 임의의 텍스트를 `[a-z0-9-]` 슬러그로 정규화한다.
 * - 문자/숫자가 아닌 연속 구간은 하이픈 하나로 합친다 (`&`도 `and`로 바꾸지 않는다)
 * - NFKC로 먼저 합성/호환 분해 (NFD 악센트, 합자 `ﬁ`, 분수 `½` 등)
 * - 악센트 등은 slugify 문자표로 ASCII 음역, 음역 불가 문자(한자 등)는 제거
 * - 앞뒤 하이픈 제거, 빈 입력은 빈 문자열
 */
export function slugifyText(value: string | null | undefined): string {
  if (!value) return '';
  const spaced = value.normalize('NFKC').replace(NON_WORD_RUN_REGEX, ' ');
  if (!spaced.trim()) return '';

  return slugify(spaced, {
    lower: true,
    strict: false,
    replacement: '-',
    trim: true,
  })
    .replace(SLUG_DISALLOWED_RUN_REGEX, '-')
    .replace(EDGE_HYPHENS_REGEX, '');
}
