/**
 * Decrypto Auth Service
 * Exchanges credentials for access tokens
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { PasswordService } from '@decrypto/common/crypto';
import { AccessTokenResponse, IssuedToken, TokenService } from '@decrypto/common/jwt';
import { ERRORS } from '@decrypto/common/errors';
import { Identity } from '@decrypto/common/types';
import { USER_STORE, UserStore } from '../users/user-store';
import { LoginDto } from './dto/login.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  // Same cost parameters as real hashes, created on first use
  private dummyHash: string | null = null;

  constructor(
    @Inject(USER_STORE) private userStore: UserStore,
    private passwordService: PasswordService,
    private tokenService: TokenService,
  ) {}

  /**
   * Verify credentials and issue a token.
   * Unknown email, wrong password and inactive account are indistinguishable.
   */
  async login(dto: LoginDto): Promise<AccessTokenResponse> {
    const identity = await this.authenticate(dto.email, dto.password);

    if (this.passwordService.needsRehash(identity.password_hash)) {
      const upgraded = await this.passwordService.hash(dto.password);
      await this.userStore.updatePasswordHash(identity.id, upgraded);
      this.logger.log(`Password hash upgraded: ${identity.id}`);
    }

    this.logger.log(`User logged in: ${identity.id}`);
    return this.toResponse(this.tokenService.issue(identity.id));
  }

  /**
   * Issue a fresh token for an already authenticated identity
   */
  refresh(identity: Identity): AccessTokenResponse {
    return this.toResponse(this.tokenService.issue(identity.id));
  }

  private async authenticate(email: string, password: string): Promise<Identity> {
    const identity = await this.userStore.findByEmail(email);

    if (!identity) {
      // Unknown emails cost one verification, same as a wrong password
      await this.passwordService.verify(password, await this.getDummyHash());
      throw ERRORS.InvalidCredentials();
    }

    const isValid = await this.passwordService.verify(password, identity.password_hash);

    if (!isValid || !identity.is_active) {
      this.logger.warn(`Login rejected: ${identity.id}`);
      throw ERRORS.InvalidCredentials();
    }

    return identity;
  }

  private async getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = await this.passwordService.hash('decrypto-unknown-account');
    }
    return this.dummyHash;
  }

  private toResponse(issued: IssuedToken): AccessTokenResponse {
    return {
      access_token: issued.token,
      token_type: 'bearer',
      expires_in: Math.round((issued.expiresAt.getTime() - issued.issuedAt.getTime()) / 1000),
    };
  }
}
