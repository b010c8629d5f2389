import { describe, it, expect, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../../auth/token.service';
import { InvalidTokenException } from '../../auth/exceptions/invalid-token.exception';

const config = { jwtSecret: 'test-secret', accessTokenTtlSeconds: 1800 };

describe('TokenService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('validates a freshly issued token back to its subject', () => {
    const service = new TokenService(config);
    const token = service.issue('a@test.com');

    expect(service.validate(token)).toBe('a@test.com');
  });

  it('signs with HS256 and the requested lifetime', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const service = new TokenService(config);

    const token = service.issue('a@test.com', 60);
    const decoded = jwt.decode(token, { complete: true });

    expect(decoded?.header.alg).toBe('HS256');
    expect(decoded?.payload).toEqual({
      sub: 'a@test.com',
      iat: 1767225600,
      exp: 1767225660,
    });
  });

  it('uses a 15 minute lifetime by default', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const service = new TokenService(config);

    const decoded = jwt.decode(service.issue('a@test.com'));

    expect(decoded).toMatchObject({ exp: 1767225600 + 900 });
  });

  it('rejects a token once it has expired', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const service = new TokenService(config);
    const token = service.issue('a@test.com', 60);

    vi.setSystemTime(new Date('2026-01-01T00:01:01Z'));

    expect(() => service.validate(token)).toThrow(InvalidTokenException);
    expect(() => service.validate(token)).toThrow('Token has expired');
  });

  it('rejects a token signed with another secret', () => {
    const token = new TokenService({ ...config, jwtSecret: 'other-secret' }).issue('a@test.com');

    expect(() => new TokenService(config).validate(token)).toThrow('Could not validate credentials');
  });

  it('rejects a token signed with another algorithm', () => {
    const token = jwt.sign({ sub: 'a@test.com' }, 'test-secret', { algorithm: 'HS512', expiresIn: 60 });

    expect(() => new TokenService(config).validate(token)).toThrow(InvalidTokenException);
  });

  it('rejects a token without an expiry', () => {
    const token = jwt.sign({ sub: 'a@test.com' }, 'test-secret', { algorithm: 'HS256' });

    expect(() => new TokenService(config).validate(token)).toThrow(InvalidTokenException);
  });

  it('rejects a token without a subject', () => {
    const token = jwt.sign({ scope: 'all' }, 'test-secret', { algorithm: 'HS256', expiresIn: 60 });

    expect(() => new TokenService(config).validate(token)).toThrow(InvalidTokenException);
  });

  it('rejects malformed input', () => {
    const service = new TokenService(config);

    expect(() => service.validate('not-a-token')).toThrow(InvalidTokenException);
    expect(() => service.validate('')).toThrow(InvalidTokenException);
  });
});
