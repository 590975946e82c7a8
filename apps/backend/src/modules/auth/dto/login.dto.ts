import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsString, MaxLength, MinLength } from 'class-validator';
import { trimLowercase } from '../../../common/utils/transforms';

export class LoginDto {
  @ApiProperty({
    description: 'Account email address',
    example: 'driver@example.com',
  })
  @Transform(trimLowercase)
  @IsEmail()
  email!: string;

  @ApiProperty({
    description: 'Account password',
    example: 'secret123',
  })
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  password!: string;
}
