import { Module } from '@nestjs/common';
import { AuthConfigProvider, AUTH_CONFIG } from '../providers/auth-config.provider';
import { UsersModule } from '../users/users.module';
import { AuthService } from './auth.service';
import { TokenService } from './token.service';

@Module({
  imports: [UsersModule],
  providers: [AuthConfigProvider, AuthService, TokenService],
  exports: [AUTH_CONFIG, AuthService, TokenService],
})
export class AuthModule {}
