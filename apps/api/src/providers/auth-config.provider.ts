import type { Provider } from '@nestjs/common';
import { DEFAULT_ACCESS_TOKEN_TTL_MINUTES } from '../constants';

export const AUTH_CONFIG = Symbol('AUTH_CONFIG');

export interface AuthConfig {
  jwtSecret: string;
  /** Lifetime of tokens issued at login. */
  accessTokenTtlSeconds: number;
}

const DEV_JWT_SECRET = 'dev-secret-change-me';

export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  if (env.NODE_ENV === 'production' && !env.JWT_SECRET) {
    throw new Error('JWT_SECRET environment variable is required in production');
  }

  const ttlMinutes = env.ACCESS_TOKEN_TTL_MINUTES
    ? Number(env.ACCESS_TOKEN_TTL_MINUTES)
    : DEFAULT_ACCESS_TOKEN_TTL_MINUTES;
  if (!Number.isInteger(ttlMinutes) || ttlMinutes <= 0) {
    throw new Error(`ACCESS_TOKEN_TTL_MINUTES must be a positive integer, got "${env.ACCESS_TOKEN_TTL_MINUTES}"`);
  }

  return {
    jwtSecret: env.JWT_SECRET || DEV_JWT_SECRET,
    accessTokenTtlSeconds: ttlMinutes * 60,
  };
}

export const AuthConfigProvider: Provider<AuthConfig> = {
  provide: AUTH_CONFIG,
  useFactory: () => loadAuthConfig(),
};
