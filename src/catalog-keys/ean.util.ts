import { EAN_LENGTHS } from '../config/catalog-keys.config';
import {
  EAN_DIGITS_REGEX,
  NON_DIGIT_REGEX,
} from '../common/constants/key-patterns.constants';
import { InvalidInputError } from '../common/errors/catalog-key.errors';

/**
 * 숫자 외 문자를 모두 제거한다. 고정 길이 코드라 자르거나 해시를 붙이지 않는다.
 */
export function normalizeEan(text: string | null | undefined): string {
  const digits = (text ?? '').replace(NON_DIGIT_REGEX, '');
  if (!digits) {
    throw new InvalidInputError(
      `EAN에 숫자가 없습니다, text=${JSON.stringify(text ?? null)}`,
    );
  }
  return digits;
}

/**
 * 숫자로만 이루어지고 길이가 8/12/13/14자리면 true.
 * 체크 디지트는 검증하지 않는다.
 */
export function validateEan(ean: string | null | undefined): boolean {
  if (!ean) return false;
  if (!EAN_DIGITS_REGEX.test(ean)) return false;
  return EAN_LENGTHS.includes(ean.length);
}
