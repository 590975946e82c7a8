import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, Min } from 'class-validator';
import { CreateCarDto } from './create-car.dto';

export class AdminCreateCarDto extends CreateCarDto {
  @ApiProperty({ description: 'Owner user id', example: 2 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ownerId!: number;
}
