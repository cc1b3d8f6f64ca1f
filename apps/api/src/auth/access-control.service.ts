/**
 * Access Control Service
 * Single authorization decision point for protected operations.
 * Fail-closed: every ambiguity resolves to a denial. Store failures are
 * thrown, never turned into a denial.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TokenService } from '@decrypto/common/jwt';
import { EventPhase } from '@decrypto/common/event';
import { withDeadline } from '@decrypto/common/database';
import { DecryptoError, ERRORS } from '@decrypto/common/errors';
import { Identity, UserRole } from '@decrypto/common/types';
import { USER_STORE, UserStore } from '../users/user-store';
import { AccessPolicy, DenialReason } from './access-policy';

export type AccessDecision =
  | { allowed: true; identity: Identity | null }
  | { allowed: false; reason: DenialReason };

@Injectable()
export class AccessControlService {
  private readonly logger = new Logger(AccessControlService.name);
  private readonly storeTimeoutMs: number;

  constructor(
    private tokenService: TokenService,
    @Inject(USER_STORE) private userStore: UserStore,
    private configService: ConfigService,
  ) {
    this.storeTimeoutMs = this.configService.getOrThrow<number>('authStoreTimeoutMs');
  }

  async authorize(
    rawToken: string | null,
    phase: EventPhase,
    policy: AccessPolicy,
  ): Promise<AccessDecision> {
    let identity: Identity | null = null;

    if (rawToken === null) {
      if (!policy.anonymous) {
        return deny(DenialReason.UNAUTHENTICATED);
      }
    } else {
      const validation = this.tokenService.validate(rawToken);
      if (validation.valid) {
        identity = await this.findIdentity(validation.subject);
        if (identity && !identity.is_active) {
          identity = null;
        }
        if (!identity) {
          this.logger.warn(`Token subject ${validation.subject} is unknown or inactive`);
        }
      }

      // A stale credential on a public operation leaves the caller anonymous;
      // elsewhere expired, forged and malformed tokens all look the same
      if (!identity && !policy.anonymous) {
        return deny(DenialReason.UNAUTHENTICATED);
      }
    }

    const isSuperuser = identity?.role === UserRole.SUPERUSER;

    if (policy.superuser && !isSuperuser) {
      return deny(identity ? DenialReason.FORBIDDEN : DenialReason.UNAUTHENTICATED);
    }

    // Superusers are exempt so the event can be administered before and after it runs
    if (policy.activeEvent && phase !== EventPhase.ACTIVE && !isSuperuser) {
      return deny(DenialReason.EVENT_NOT_ACTIVE);
    }

    return { allowed: true, identity };
  }

  private async findIdentity(id: string): Promise<Identity | null> {
    try {
      return await withDeadline(this.userStore.findById(id), this.storeTimeoutMs, 'findById');
    } catch (error) {
      if (error instanceof DecryptoError) {
        throw error;
      }
      this.logger.error(
        `User lookup failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw ERRORS.StoreUnavailable('findById', error instanceof Error ? error : undefined);
    }
  }
}

function deny(reason: DenialReason): AccessDecision {
  return { allowed: false, reason };
}
