// 키 정규화/검증 공용 패턴
// ⚠️ test()에 쓰는 패턴에는 g 플래그를 붙이지 말 것 (lastIndex 상태가 남는다)

export const NON_WORD_RUN_REGEX = /[^\p{L}\p{N}]+/gu;
export const SLUG_DISALLOWED_RUN_REGEX = /[^a-z0-9]+/g;
export const EDGE_HYPHENS_REGEX = /^-+|-+$/g;
export const TRAILING_SEPARATORS_REGEX = /[-_]+$/;
export const NON_DIGIT_REGEX = /[^0-9]/g;

export const IDX_CHARSET_REGEX = /^[a-z0-9_-]+$/;
export const URL_KEY_CHARSET_REGEX = /^[a-z0-9-]+$/;
export const SKU_CHARSET_REGEX = /^[A-Za-z0-9-]+$/;
export const EAN_DIGITS_REGEX = /^[0-9]+$/;
export const EDGE_SEPARATOR_REGEX = /^[-_]|[-_]$/;
