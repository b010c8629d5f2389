import { IsEmail, IsString, IsOptional, MinLength, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RegisterDto {
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name!: string;

  @IsEmail()
  @MaxLength(255)
  email!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(128)
  password!: string;

  @ApiProperty({ required: false, example: 'user' })
  @IsString()
  @IsOptional()
  @MinLength(1)
  @MaxLength(50)
  role?: string;
}

/** Accepted as a form body or JSON; `username` carries the email. */
export class LoginDto {
  @ApiProperty({ description: 'Account email' })
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  username!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(128)
  password!: string;
}

export class UserDto {
  id!: number;
  email!: string;
  name!: string;
  role!: string;
  active!: boolean;
}

export class TokenResponseDto {
  access_token!: string;
  @ApiProperty({ enum: ['bearer'] })
  token_type!: 'bearer';
}
