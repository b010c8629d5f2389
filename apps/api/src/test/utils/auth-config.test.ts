import { describe, it, expect } from 'vitest';
import { loadAuthConfig } from '../../providers/auth-config.provider';

describe('loadAuthConfig', () => {
  it('falls back to the development secret and a 30 minute lifetime', () => {
    expect(loadAuthConfig({})).toEqual({
      jwtSecret: 'dev-secret-change-me',
      accessTokenTtlSeconds: 1800,
    });
  });

  it('reads the secret and lifetime from the environment', () => {
    expect(loadAuthConfig({ JWT_SECRET: 'test-secret', ACCESS_TOKEN_TTL_MINUTES: '5' })).toEqual({
      jwtSecret: 'test-secret',
      accessTokenTtlSeconds: 300,
    });
  });

  it('requires a secret in production', () => {
    expect(() => loadAuthConfig({ NODE_ENV: 'production' })).toThrow(
      'JWT_SECRET environment variable is required in production',
    );
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects ACCESS_TOKEN_TTL_MINUTES=%s', (value) => {
    expect(() => loadAuthConfig({ ACCESS_TOKEN_TTL_MINUTES: value })).toThrow(
      `ACCESS_TOKEN_TTL_MINUTES must be a positive integer, got "${value}"`,
    );
  });
});
