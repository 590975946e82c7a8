import { ApiProperty } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { PaginationQueryDto } from '../../../common/dto/pagination-query.dto';
import {
  CarColor,
  CarCondition,
  CarStatus,
  CarType,
  FuelType,
  TransmissionType,
} from '../../../common/enums/app.enums';
import { trim } from '../../../common/utils/transforms';

export class AdminCarQueryDto extends PaginationQueryDto {
  @ApiProperty({ enum: CarStatus, required: false })
  @IsOptional()
  @IsEnum(CarStatus)
  status?: CarStatus;
}

export class CarQueryDto extends AdminCarQueryDto {
  @ApiProperty({
    description: 'Search in model, color and plate',
    example: 'corolla',
    required: false,
  })
  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(50)
  search?: string;

  @ApiProperty({ enum: CarType, required: false })
  @IsOptional()
  @IsEnum(CarType)
  carType?: CarType;

  @ApiProperty({ enum: CarColor, required: false })
  @IsOptional()
  @IsEnum(CarColor)
  color?: CarColor;

  @ApiProperty({ enum: FuelType, required: false })
  @IsOptional()
  @IsEnum(FuelType)
  fuelType?: FuelType;

  @ApiProperty({ enum: TransmissionType, required: false })
  @IsOptional()
  @IsEnum(TransmissionType)
  transmission?: TransmissionType;

  @ApiProperty({ enum: CarCondition, required: false })
  @IsOptional()
  @IsEnum(CarCondition)
  condition?: CarCondition;

  @ApiProperty({ required: false, example: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  brandId?: number;

  @ApiProperty({ required: false, example: 2 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ownerId?: number;

  @ApiProperty({ description: 'Minimum model year', required: false })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  minYear?: number;

  @ApiProperty({ description: 'Maximum model year', required: false })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  maxYear?: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  minPrice?: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  maxPrice?: number;
}
