// 카탈로그 키 정규화/검증 배럴

export * from './idx.util';
export * from './sku.util';
export * from './ean.util';
export * from './url-key.util';
export * from '../common/errors/catalog-key.errors';
export { slugifyText } from '../common/slug/slug-normalizer.util';
export { truncateSlug, slugFingerprint } from '../common/slug/slug-truncate.util';
