import { IsEmail, MaxLength } from 'class-validator';

export class InviteQueryDto {
  @IsEmail()
  @MaxLength(255)
  user_email!: string;
}

export class MemberUserDto {
  id!: number;
  email!: string;
  name!: string;
}

export class MemberDto {
  id!: number;
  is_owner!: boolean;
  user!: MemberUserDto;
}
