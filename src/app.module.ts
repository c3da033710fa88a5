import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CatalogKeysModule } from './catalog-keys/catalog-keys.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    CatalogKeysModule, // ✅ idx / SKU / EAN / url_key 정규화·검증
  ],
})
export class AppModule {}
