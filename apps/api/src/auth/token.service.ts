import { Injectable, Inject } from '@nestjs/common';
import jwt from 'jsonwebtoken';
import { AUTH_CONFIG, type AuthConfig } from '../providers/auth-config.provider';
import { DEFAULT_TOKEN_TTL_SECONDS, TOKEN_ALGORITHM } from '../constants';
import { InvalidTokenException } from './exceptions/invalid-token.exception';

/**
 * Issues and validates signed, time-limited bearer tokens (HS256 JWT).
 *
 * Validity is a function of signature and `exp` only: there is no revocation
 * list, so a token stays usable until it expires.
 */
@Injectable()
export class TokenService {
  constructor(@Inject(AUTH_CONFIG) private readonly config: AuthConfig) {}

  issue(subject: string, ttlSeconds: number = DEFAULT_TOKEN_TTL_SECONDS): string {
    return jwt.sign({ sub: subject }, this.config.jwtSecret, {
      algorithm: TOKEN_ALGORITHM,
      expiresIn: ttlSeconds,
    });
  }

  /** Returns the token's subject or throws {@link InvalidTokenException}. */
  validate(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.jwtSecret, { algorithms: [TOKEN_ALGORITHM] });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new InvalidTokenException('Token has expired');
      }
      throw new InvalidTokenException();
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number' || !payload.sub) {
      throw new InvalidTokenException();
    }
    return payload.sub;
  }
}
