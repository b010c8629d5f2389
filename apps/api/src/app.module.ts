import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { DatabaseModule } from './database/database.module';
import { ApiModule } from './api/api.module';
import { HealthModule } from './health/health.module';
import { AuthorizationModule } from './authorization/authorization.module';
import { JwtAuthGuard } from './api/guards/jwt-auth.guard';
import {
  THROTTLE_SHORT_TTL_MS,
  THROTTLE_SHORT_LIMIT,
  THROTTLE_MEDIUM_TTL_MS,
  THROTTLE_MEDIUM_LIMIT,
} from './constants';

@Module({
  imports: [
    LoggerModule.forRoot({
      pinoHttp: {
        level: process.env.LOG_LEVEL || 'info',
        redact: ['req.headers.authorization'],
        transport: process.env.NODE_ENV !== 'production'
          ? { target: 'pino-pretty' }
          : undefined,
      },
    }),
    DatabaseModule,
    ThrottlerModule.forRoot({
      throttlers: [
        { name: 'short', ttl: THROTTLE_SHORT_TTL_MS, limit: THROTTLE_SHORT_LIMIT },
        { name: 'medium', ttl: THROTTLE_MEDIUM_TTL_MS, limit: THROTTLE_MEDIUM_LIMIT },
      ],
    }),
    AuthorizationModule,
    ApiModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_GUARD, useClass: JwtAuthGuard },
  ],
})
export class AppModule {}
