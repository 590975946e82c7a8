import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { PaginationQueryDto } from '../../../common/dto/pagination-query.dto';
import { trim } from '../../../common/utils/transforms';

export class UserQueryDto extends PaginationQueryDto {
  @ApiProperty({
    description: 'Search in username, full name and email',
    example: 'silva',
    required: false,
  })
  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(120)
  search?: string;
}
