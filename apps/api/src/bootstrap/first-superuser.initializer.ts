/**
 * First Superuser Initializer
 * Ensures the configured superuser exists before the HTTP listener opens.
 * Safe to run on every start and from several instances at once.
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FirstSuperuserConfig } from '@decrypto/common/config';
import { PasswordService } from '@decrypto/common/crypto';
import { DecryptoError, ErrorCode } from '@decrypto/common/errors';
import { UserRole } from '@decrypto/common/types';
import { USER_STORE, UserStore } from '../users/user-store';

@Injectable()
export class FirstSuperuserInitializer implements OnModuleInit {
  private readonly logger = new Logger(FirstSuperuserInitializer.name);
  private readonly superuser: FirstSuperuserConfig;

  constructor(
    @Inject(USER_STORE) private userStore: UserStore,
    private passwordService: PasswordService,
    private configService: ConfigService,
  ) {
    this.superuser = this.configService.getOrThrow<FirstSuperuserConfig>('firstSuperuser');
  }

  async onModuleInit(): Promise<void> {
    await this.ensureFirstSuperuser();
  }

  /**
   * Returns true when the superuser was created by this call
   */
  async ensureFirstSuperuser(): Promise<boolean> {
    const existing = await this.userStore.findByEmail(this.superuser.email);
    if (existing) {
      this.logger.log('First superuser already present');
      return false;
    }

    const passwordHash = await this.passwordService.hash(this.superuser.password);

    try {
      const created = await this.userStore.create({
        email: this.superuser.email,
        username: this.superuser.username,
        full_name: this.superuser.fullName,
        password_hash: passwordHash,
        role: UserRole.SUPERUSER,
        is_active: true,
      });
      this.logger.log(`First superuser created: ${created.id}`);
      return true;
    } catch (error) {
      // Another instance won the race
      if (error instanceof DecryptoError && error.code === ErrorCode.UserAlreadyExists) {
        this.logger.log('First superuser created concurrently');
        return false;
      }
      throw error;
    }
  }
}
