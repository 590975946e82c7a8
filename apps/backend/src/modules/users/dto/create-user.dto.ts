import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsString,
  Length,
  Matches,
  MaxLength,
} from 'class-validator';
import { accounts } from '../../../common/constants/app.constants';
import { trim, trimLowercase } from '../../../common/utils/transforms';
import {
  IsNotDisposableEmail,
  IsNotReservedUsername,
} from '../../../common/validators/account.validators';

export class CreateUserDto {
  @ApiProperty({
    description: 'Unique handle; starts with a letter',
    example: 'jdriver',
    minLength: 3,
    maxLength: 20,
  })
  @Transform(trim)
  @IsString()
  @Length(3, 20)
  @Matches(/^[A-Za-z][A-Za-z0-9_]+$/, {
    message:
      'username must start with a letter and contain only letters, digits and underscores',
  })
  @IsNotReservedUsername()
  username!: string;

  @ApiProperty({
    description: 'Full name (letters and spaces)',
    example: 'Joana Silva',
    minLength: 3,
    maxLength: 50,
  })
  @Transform(trim)
  @IsString()
  @Length(3, 50)
  @Matches(/^[A-Za-zÀ-ÖØ-öø-ÿ\s]+$/, {
    message: 'fullName must contain only letters and spaces',
  })
  fullName!: string;

  @ApiProperty({
    description: 'Email address (stored lowercased)',
    example: 'joana@example.com',
    maxLength: accounts.MAX_EMAIL_LENGTH,
  })
  @Transform(trimLowercase)
  @IsEmail()
  @MaxLength(accounts.MAX_EMAIL_LENGTH)
  @IsNotDisposableEmail()
  email!: string;

  @ApiProperty({
    description: '6 to 15 characters with at least one letter and one digit',
    example: 'secret123',
    minLength: 6,
    maxLength: 15,
  })
  @IsString()
  @Length(6, 15)
  @Matches(/[A-Za-z]/, { message: 'password must contain at least one letter' })
  @Matches(/\d/, { message: 'password must contain at least one digit' })
  password!: string;
}
