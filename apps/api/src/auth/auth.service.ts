import { Injectable, Inject, Logger } from '@nestjs/common';
import { AUTH_CONFIG, type AuthConfig } from '../providers/auth-config.provider';
import { TOKEN_TYPE } from '../constants';
import { UsersService, type UserView } from '../users/users.service';
import { TokenService } from './token.service';
import { InvalidCredentialsException } from './exceptions/invalid-credentials.exception';
import { InactiveAccountException } from './exceptions/inactive-account.exception';

export interface AccessToken {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(AUTH_CONFIG) private readonly config: AuthConfig,
    private readonly usersService: UsersService,
    private readonly tokenService: TokenService,
  ) {}

  async register(input: { name: string; email: string; password: string; role?: string }): Promise<UserView> {
    const user = await this.usersService.createUser(input);
    this.logger.log({ userId: user.id }, 'User registered');
    return user;
  }

  /** `username` is the account email. */
  async login(input: { username: string; password: string }): Promise<AccessToken> {
    const user = await this.usersService.findByEmail(input.username);
    if (!user) {
      this.logger.warn({ email: input.username }, 'Login failed: user not found');
      throw new InvalidCredentialsException();
    }

    const valid = await this.usersService.verifyPassword(user, input.password);
    if (!valid) {
      this.logger.warn({ userId: user.id }, 'Login failed: invalid password');
      throw new InvalidCredentialsException();
    }

    if (!user.active) {
      this.logger.warn({ userId: user.id }, 'Login refused: account inactive');
      throw new InactiveAccountException();
    }

    const access_token = this.tokenService.issue(user.email, this.config.accessTokenTtlSeconds);
    this.logger.log({ userId: user.id }, 'User logged in');
    return { access_token, token_type: TOKEN_TYPE };
  }
}
