import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { CatalogKeysService } from './catalog-keys.service';
import {
  NormalizeKeyDto,
  NormalizeKeysBatchDto,
} from './dto/normalize-key.dto';
import { ValidateKeyDto } from './dto/validate-key.dto';
import {
  BatchNormalizeResult,
  KeyValidationResult,
  NormalizedKeyResult,
} from './catalog-keys.types';

/**
 * PIM/주문 시스템에서 호출하는 카탈로그 키 API
 */
@ApiTags('Catalog Keys')
@Controller('api/catalog-keys')
export class CatalogKeysController {
  constructor(private readonly catalogKeysService: CatalogKeysService) {}

  @Post('normalize')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '키 정규화',
    description:
      '원본 텍스트를 idx/sku/ean/url_key 규칙에 맞는 키로 변환합니다. 길이를 넘으면 해시 접미사를 붙여 자릅니다.',
  })
  @ApiOkResponse({
    description: '정규화 결과',
    schema: {
      example: {
        kind: 'idx',
        input: 'Premium Coffee Beans - Ethiopian Origin!',
        key: 'premium-coffee-beans-ethiopian-origin',
        truncated: false,
      },
    },
  })
  @ApiBadRequestResponse({ description: '정규화할 문자가 없거나 잘못된 요청' })
  normalize(@Body() dto: NormalizeKeyDto): NormalizedKeyResult {
    return this.catalogKeysService.normalize(dto.kind, dto.text, dto.maxLen);
  }

  @Post('normalize/batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '키 일괄 정규화',
    description: '실패한 항목은 error에 담기며 나머지 항목은 계속 처리됩니다.',
  })
  normalizeBatch(@Body() dto: NormalizeKeysBatchDto): BatchNormalizeResult {
    return this.catalogKeysService.normalizeMany(
      dto.kind,
      dto.texts,
      dto.maxLen,
    );
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '키 검증',
    description: '형식 위반이어도 200으로 응답하고 valid=false와 사유를 돌려줍니다.',
  })
  @ApiOkResponse({
    description: '검증 결과',
    schema: {
      example: {
        kind: 'ean',
        value: '12345',
        valid: false,
        code: 'VALIDATION_ERROR',
        reason: 'EAN은 8/12/13/14자리 숫자여야 합니다',
      },
    },
  })
  validate(@Body() dto: ValidateKeyDto): KeyValidationResult {
    return this.catalogKeysService.validate(dto.kind, dto.value);
  }
}
