import { IsIn, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { CATALOG_KEY_KINDS, CatalogKeyKind } from '../catalog-keys.types';
import { NORMALIZE_TEXT_MAX_LENGTH } from './normalize-key.dto';

/**
 * 키 검증 요청 DTO
 */
export class ValidateKeyDto {
  @ApiProperty({ enum: [...CATALOG_KEY_KINDS], example: 'ean' })
  @IsIn([...CATALOG_KEY_KINDS])
  kind!: CatalogKeyKind;

  @ApiProperty({ description: '검증할 키 값', example: '123456789012' })
  @IsString()
  @MaxLength(NORMALIZE_TEXT_MAX_LENGTH)
  value!: string;
}
