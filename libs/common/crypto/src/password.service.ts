/**
 * Decrypto Password Service
 * Argon2id password hashing
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as argon2 from 'argon2';
import { PasswordHashingConfig } from '@decrypto/common/config';
import { ERRORS } from '@decrypto/common/errors';

// $argon2id$v=19$m=65536,t=2,p=1$<salt>$<hash>
const ARGON2_PHC =
  /^\$argon2(id|i|d)\$v=\d+\$m=\d+,t=\d+,p=\d+\$[A-Za-z0-9+/]+={0,2}\$[A-Za-z0-9+/]+={0,2}$/;

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);
  private readonly options: PasswordHashingConfig;

  constructor(private configService: ConfigService) {
    this.options = this.configService.getOrThrow<PasswordHashingConfig>('passwordHashing');
  }

  /**
   * Hash password using Argon2id
   * A fresh 16-byte salt is generated per call; the PHC output embeds the
   * algorithm, version, cost parameters and salt.
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: this.options.timeCost,
        memoryCost: this.options.memoryCost,
        parallelism: this.options.parallelism,
        hashLength: 32,
      });
    } catch (error) {
      this.logger.error(
        `Password hashing failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw ERRORS.InternalError('Password hashing failed', error instanceof Error ? error : undefined);
    }
  }

  /**
   * Verify password against a stored hash.
   * Returns false for anything that is not an argon2 hash.
   * Throws MalformedHash when the hash claims to be argon2 but cannot be parsed.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    if (!hash.startsWith('$argon2')) {
      this.logger.warn('Password verification against a non-argon2 hash');
      return false;
    }

    if (!ARGON2_PHC.test(hash)) {
      throw ERRORS.MalformedHash();
    }

    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.error(
        `Password verification failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * True when the hash was produced with cost parameters other than the configured ones
   */
  needsRehash(hash: string): boolean {
    if (!ARGON2_PHC.test(hash)) {
      return false;
    }

    return argon2.needsRehash(hash, {
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
      parallelism: this.options.parallelism,
    });
  }
}
