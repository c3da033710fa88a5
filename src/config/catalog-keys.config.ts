// src/config/catalog-keys.config.ts
// ✅ 키 길이 정책/해시 규칙을 "문서+코드" 단일 소스로 관리
export const CATALOG_KEY_LIMITS = {
  idxMaxLength: 128,
  idxMinLength: 1,
  skuMaxLength: 128,
  urlKeyMaxLength: 128,
  // 환경변수로 올릴 수 있는 상한 (DB 컬럼 길이 기준)
  hardMaxLength: 1024,
} as const;

// 잘림 발생 시 붙는 해시 (md5 앞 8자리)
export const HASH_SUFFIX = {
  algorithm: 'md5',
  length: 8,
  idxSeparator: '_',
  slugSeparator: '-',
} as const;

// EAN-8, UPC-A(12), EAN-13, GTIN-14
export const EAN_LENGTHS: readonly number[] = [8, 12, 13, 14];

export const CATALOG_KEY_ENV = {
  idxMaxLength: 'CATALOG_IDX_MAX_LENGTH',
  skuMaxLength: 'CATALOG_SKU_MAX_LENGTH',
  urlKeyMaxLength: 'CATALOG_URL_KEY_MAX_LENGTH',
} as const;

export const BATCH_MAX_ITEMS = 500;
