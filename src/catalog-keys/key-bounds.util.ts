import { InvalidArgumentError } from '../common/errors/catalog-key.errors';

export function assertMaxLength(maxLen: number): void {
  if (!Number.isInteger(maxLen) || maxLen <= 0) {
    throw new InvalidArgumentError(
      `max_len은 1 이상의 정수여야 합니다, max_len=${maxLen}`,
    );
  }
}

export function assertLengthBounds(minLen: number, maxLen: number): void {
  if (!Number.isInteger(minLen) || minLen < 0) {
    throw new InvalidArgumentError(
      `min_len은 0 이상의 정수여야 합니다, min_len=${minLen}`,
    );
  }
  if (!Number.isInteger(maxLen) || maxLen < 0) {
    throw new InvalidArgumentError(
      `max_len은 0 이상의 정수여야 합니다, max_len=${maxLen}`,
    );
  }
  if (minLen > maxLen) {
    throw new InvalidArgumentError(
      `min_len(${minLen})이 max_len(${maxLen})보다 클 수 없습니다`,
    );
  }
}
