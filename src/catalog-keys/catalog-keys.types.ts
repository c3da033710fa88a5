import { ErrorCodes } from '../common/errors/catalog-key.errors';

export const CATALOG_KEY_KINDS = ['idx', 'sku', 'ean', 'url_key'] as const;

export type CatalogKeyKind = (typeof CATALOG_KEY_KINDS)[number];

export interface CatalogKeyLimits {
  idxMaxLength: number;
  skuMaxLength: number;
  urlKeyMaxLength: number;
}

export interface NormalizedKeyResult {
  kind: CatalogKeyKind;
  input: string;
  key: string;
  /** 길이 초과로 해시 접미사가 붙었는지 */
  truncated: boolean;
}

export interface KeyValidationResult {
  kind: CatalogKeyKind;
  value: string;
  valid: boolean;
  code: ErrorCodes | null;
  reason: string | null;
}

export interface BatchNormalizeItem {
  input: string;
  key: string | null;
  error: { code: ErrorCodes; message: string } | null;
}

export interface BatchNormalizeResult {
  kind: CatalogKeyKind;
  total: number;
  normalized: number;
  failed: number;
  items: BatchNormalizeItem[];
}
