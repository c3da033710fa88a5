import { Module } from '@nestjs/common';
import { CatalogKeysService } from './catalog-keys.service';
import { CatalogKeysController } from './catalog-keys.controller';

/**
 * 카탈로그 키 정규화/검증 모듈
 *
 * 제공 기능:
 * - idx / SKU / EAN / url_key 정규화 및 검증
 * - 일괄 정규화
 */
@Module({
  providers: [CatalogKeysService],
  controllers: [CatalogKeysController],
  exports: [CatalogKeysService],
})
export class CatalogKeysModule {}
