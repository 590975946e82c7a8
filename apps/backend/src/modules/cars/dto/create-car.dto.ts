import { ApiProperty } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';
import {
  CarColor,
  CarCondition,
  CarStatus,
  CarType,
  FuelType,
  TransmissionType,
} from '../../../common/enums/app.enums';
import { normalizePlate, trim } from '../../../common/utils/transforms';
import { IsVehiclePlate } from '../../../common/validators/plate.validator';

export class CreateCarDto {
  @ApiProperty({ description: 'Body style', enum: CarType, example: CarType.SEDAN })
  @IsEnum(CarType)
  carType!: CarType;

  @ApiProperty({
    description: 'Model name (letters, digits, spaces, hyphens)',
    example: 'Corolla XEi',
    minLength: 2,
    maxLength: 50,
  })
  @Transform(trim)
  @IsString()
  @Length(2, 50)
  @Matches(/^[A-Za-z0-9\s-]+$/, {
    message: 'model must contain only letters, digits, spaces and hyphens',
  })
  model!: string;

  @ApiProperty({ description: 'Year of manufacture', example: 2021 })
  @Type(() => Number)
  @IsInt()
  factoryYear!: number;

  @ApiProperty({
    description: 'Model year; not before the factory year',
    example: 2022,
  })
  @Type(() => Number)
  @IsInt()
  modelYear!: number;

  @ApiProperty({ enum: CarColor, example: CarColor.SILVER })
  @IsEnum(CarColor)
  color!: CarColor;

  @ApiProperty({ enum: FuelType, example: FuelType.FLEX })
  @IsEnum(FuelType)
  fuelType!: FuelType;

  @ApiProperty({ enum: TransmissionType, example: TransmissionType.AUTOMATIC })
  @IsEnum(TransmissionType)
  transmission!: TransmissionType;

  @ApiProperty({ enum: CarCondition, example: CarCondition.USED })
  @IsEnum(CarCondition)
  condition!: CarCondition;

  @ApiProperty({
    enum: CarStatus,
    example: CarStatus.AVAILABLE,
    required: false,
  })
  @IsOptional()
  @IsEnum(CarStatus)
  status?: CarStatus;

  @ApiProperty({ description: 'Odometer reading in km', example: 35000 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  mileage!: number;

  @ApiProperty({
    description: 'Plate, legacy AAA-0000 or Mercosul AAA0A00',
    example: 'BRA2E19',
  })
  @Transform(normalizePlate)
  @IsString()
  @IsVehiclePlate()
  plate!: string;

  @ApiProperty({ description: 'Asking price', example: 98500 })
  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price!: number;

  @ApiProperty({
    description: 'Free-text description',
    example: 'Single owner, full service history',
    required: false,
  })
  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(1000)
  description?: string;

  @ApiProperty({ description: 'Brand id', example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  brandId!: number;
}
