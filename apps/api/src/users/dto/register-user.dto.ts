/**
 * User registration DTOs
 */

import {
  IsBoolean,
  IsEmail,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

export class RegisterUserDto {
  @IsEmail()
  email!: string;

  @IsString()
  @Matches(/^[A-Za-z0-9_.-]{3,32}$/, {
    message: 'username must be 3-32 letters, digits, dots, dashes or underscores',
  })
  username!: string;

  @IsString()
  @MinLength(8)
  @MaxLength(128)
  password!: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  full_name?: string;
}

export class CreateUserDto extends RegisterUserDto {
  @IsOptional()
  @IsBoolean()
  is_superuser?: boolean;
}
