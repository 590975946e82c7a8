import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsOptional, IsString, Length, Matches } from 'class-validator';
import { trim } from '../../../common/utils/transforms';

export class CreateBrandDto {
  @ApiProperty({
    description: 'Brand name (letters, digits, spaces, hyphens)',
    example: 'Rolls-Royce',
    minLength: 2,
    maxLength: 50,
  })
  @Transform(trim)
  @IsString()
  @Length(2, 50)
  @Matches(/^[A-Za-z0-9\s-]+$/, {
    message: 'name must contain only letters, digits, spaces and hyphens',
  })
  name!: string;

  @ApiProperty({
    description:
      'Optional description; maximum length is set by MAX_BRAND_DESCRIPTION',
    example: 'British luxury manufacturer',
    required: false,
  })
  @IsOptional()
  @Transform(trim)
  @IsString()
  description?: string;
}
