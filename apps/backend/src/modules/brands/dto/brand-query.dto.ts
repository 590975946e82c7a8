import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { PaginationQueryDto } from '../../../common/dto/pagination-query.dto';
import { toBoolean, trim } from '../../../common/utils/transforms';

export class BrandQueryDto extends PaginationQueryDto {
  @ApiProperty({
    description: 'Search in brand name',
    example: 'toy',
    required: false,
  })
  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(50)
  search?: string;

  @ApiProperty({
    description: 'Filter by active flag (defaults to active brands)',
    example: true,
    required: false,
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  isActive?: boolean;
}
