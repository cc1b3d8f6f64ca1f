/**
 * Decrypto Token Service
 * Issues and validates HS256 access tokens
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { CLOCK, Clock } from '@decrypto/common/clock';
import { ERRORS } from '@decrypto/common/errors';
import { IssuedToken, TokenClaims, TokenRejection, TokenValidation } from './jwt.types';

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly accessTokenTtl: number;

  constructor(
    private nestJwtService: NestJwtService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.accessTokenTtl = this.configService.getOrThrow<number>('accessTokenTtlSeconds');
  }

  /**
   * Issue a token for the subject; exp = iat + ttl
   */
  issue(subject: string, ttlSeconds: number = this.accessTokenTtl): IssuedToken {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw ERRORS.ValidationError('Token lifetime must be a positive number of seconds', 'ttl');
    }

    const now = this.nowSeconds();
    const claims: TokenClaims = {
      sub: subject,
      iat: now,
      exp: now + ttlSeconds,
    };

    // exp is always set explicitly in claims, never through expiresIn
    const token = this.nestJwtService.sign(claims, { algorithm: 'HS256' });

    return {
      token,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  /**
   * Validate a token: signature first, then expiry, then claim shape.
   * Every call verifies both signature and expiry.
   */
  validate(token: string): TokenValidation {
    if (!token) {
      return this.reject('Malformed');
    }

    const now = this.nowSeconds();
    let payload: Record<string, unknown>;

    try {
      payload = this.nestJwtService.verify<Record<string, unknown>>(token, {
        algorithms: ['HS256'],
        clockTimestamp: now,
      });
    } catch (error) {
      return this.reject(this.classify(error));
    }

    const { sub, iat, exp } = payload;
    if (typeof exp !== 'number') {
      return this.reject('Malformed');
    }
    if (exp <= now) {
      return this.reject('Expired');
    }
    if (typeof sub !== 'string' || sub.length === 0 || typeof iat !== 'number') {
      return this.reject('Malformed');
    }

    return { valid: true, subject: sub, claims: { sub, iat, exp } };
  }

  private classify(error: unknown): TokenRejection {
    if (!(error instanceof Error)) {
      return 'Malformed';
    }

    switch (error.name) {
      case 'TokenExpiredError':
        return 'Expired';
      case 'JsonWebTokenError':
        return error.message === 'jwt malformed' || error.message === 'invalid token'
          ? 'Malformed'
          : 'BadSignature';
      default:
        return 'BadSignature';
    }
  }

  private reject(reason: TokenRejection): TokenValidation {
    this.logger.debug(`Token rejected: ${reason}`);
    return { valid: false, reason };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}
