import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

/**
 * Swagger 문서 구성
 * - 운영 환경에서는 비활성화
 */
export function setupSwagger(app: INestApplication) {
  if (process.env.NODE_ENV === 'production') return;

  const config = new DocumentBuilder()
    .setTitle('Catalog Keys API')
    .setDescription('상품 idx / SKU / EAN / url_key 정규화·검증 API 명세입니다.')
    .setVersion('1.0.0')
    .build();

  const document = SwaggerModule.createDocument(app, config, {
    deepScanRoutes: true,
  });

  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      displayRequestDuration: true,
    },
    customSiteTitle: 'Catalog Keys API Docs',
  });
}
