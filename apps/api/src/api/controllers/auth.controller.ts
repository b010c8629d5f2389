import { Controller, Post, Get, Body, HttpCode } from '@nestjs/common';
import { ApiBearerAuth, ApiConsumes, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { AuthService } from '../../auth/auth.service';
import { Public } from '../decorators/public.decorator';
import { CurrentUser, RequestUser } from '../decorators/current-user.decorator';
import { RegisterDto, LoginDto, UserDto, TokenResponseDto } from '../dto/auth.dto';

@ApiTags('Auth')
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('auth')
  @Public()
  @HttpCode(200)
  @Throttle({ short: { limit: 5, ttl: 60000 }, medium: { limit: 5, ttl: 60000 } })
  async register(@Body() body: RegisterDto): Promise<UserDto> {
    return this.authService.register(body);
  }

  @Post('login')
  @Public()
  @HttpCode(200)
  @ApiConsumes('application/x-www-form-urlencoded', 'application/json')
  @Throttle({ short: { limit: 10, ttl: 60000 }, medium: { limit: 10, ttl: 60000 } })
  async login(@Body() body: LoginDto): Promise<TokenResponseDto> {
    return this.authService.login(body);
  }

  @Get('me')
  @ApiBearerAuth()
  async me(@CurrentUser() user: RequestUser): Promise<UserDto> {
    return user;
  }
}
