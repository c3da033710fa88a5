import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  BATCH_MAX_ITEMS,
  CATALOG_KEY_LIMITS,
} from '../../config/catalog-keys.config';
import { CATALOG_KEY_KINDS, CatalogKeyKind } from '../catalog-keys.types';

/**
 * 입력 텍스트 최대 길이 (정규화 전)
 */
export const NORMALIZE_TEXT_MAX_LENGTH = 4096;

const toOptionalInt = ({ value }: { value: unknown }) =>
  value === undefined || value === null || value === ''
    ? undefined
    : Number(value);

/**
 * 단건 정규화 요청 DTO
 */
export class NormalizeKeyDto {
  @ApiProperty({ enum: [...CATALOG_KEY_KINDS], example: 'idx' })
  @IsIn([...CATALOG_KEY_KINDS])
  kind!: CatalogKeyKind;

  @ApiProperty({
    description: '정규화할 원본 텍스트 (상품명, 코드 등)',
    example: 'Premium Coffee Beans - Ethiopian Origin!',
  })
  @IsString()
  @MaxLength(NORMALIZE_TEXT_MAX_LENGTH)
  text!: string;

  @ApiPropertyOptional({
    description: `최대 길이 (1~${CATALOG_KEY_LIMITS.hardMaxLength}, ean은 무시)`,
    example: 64,
  })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(CATALOG_KEY_LIMITS.hardMaxLength)
  maxLen?: number; // 기본값은 서비스 설정값
}

/**
 * 일괄 정규화 요청 DTO
 */
export class NormalizeKeysBatchDto {
  @ApiProperty({ enum: [...CATALOG_KEY_KINDS], example: 'sku' })
  @IsIn([...CATALOG_KEY_KINDS])
  kind!: CatalogKeyKind;

  @ApiProperty({
    description: `정규화할 텍스트 목록 (1~${BATCH_MAX_ITEMS}건)`,
    example: ['COFFEE-123-ABC DEF', 'Mug Large / Blue'],
    type: [String],
  })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(BATCH_MAX_ITEMS)
  @IsString({ each: true })
  @MaxLength(NORMALIZE_TEXT_MAX_LENGTH, { each: true })
  texts!: string[];

  @ApiPropertyOptional({ description: '최대 길이', example: 64 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(CATALOG_KEY_LIMITS.hardMaxLength)
  maxLen?: number;
}
