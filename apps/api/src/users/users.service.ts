/**
 * Decrypto Users Service
 * Registration, profiles, password changes and deactivation
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PasswordService } from '@decrypto/common/crypto';
import { ERRORS } from '@decrypto/common/errors';
import { Identity, UserProfile, UserRole, toUserProfile } from '@decrypto/common/types';
import { USER_STORE, UserStore } from './user-store';
import { CreateUserDto, RegisterUserDto } from './dto/register-user.dto';
import { ChangePasswordDto } from './dto/change-password.dto';
import { ListUsersQueryDto, UpdateProfileDto } from './dto/update-profile.dto';

const DEFAULT_PAGE_SIZE = 100;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly openRegistration: boolean;

  constructor(
    @Inject(USER_STORE) private userStore: UserStore,
    private passwordService: PasswordService,
    private configService: ConfigService,
  ) {
    this.openRegistration = this.configService.get<boolean>('openRegistration') ?? false;
  }

  /**
   * Self-registration, only while the server allows it
   */
  async register(dto: RegisterUserDto): Promise<UserProfile> {
    if (!this.openRegistration) {
      throw ERRORS.RegistrationClosed();
    }

    const identity = await this.createIdentity(dto, UserRole.REGULAR);
    this.logger.log(`User registered: ${identity.id}`);
    return toUserProfile(identity);
  }

  async create(dto: CreateUserDto): Promise<UserProfile> {
    const role = dto.is_superuser ? UserRole.SUPERUSER : UserRole.REGULAR;
    const identity = await this.createIdentity(dto, role);
    this.logger.log(`User created by superuser: ${identity.id} (${role})`);
    return toUserProfile(identity);
  }

  /**
   * Own profile for everyone, any profile for superusers
   */
  async getProfile(caller: Identity, userId: string): Promise<UserProfile> {
    if (caller.id === userId) {
      return toUserProfile(caller);
    }

    if (caller.role !== UserRole.SUPERUSER) {
      throw ERRORS.Forbidden();
    }

    const identity = await this.userStore.findById(userId);
    if (!identity) {
      throw ERRORS.UserNotFound(userId);
    }

    return toUserProfile(identity);
  }

  async list(query: ListUsersQueryDto): Promise<UserProfile[]> {
    const identities = await this.userStore.list(query.skip ?? 0, query.limit ?? DEFAULT_PAGE_SIZE);
    return identities.map(toUserProfile);
  }

  async updateProfile(caller: Identity, dto: UpdateProfileDto): Promise<UserProfile> {
    if (dto.email !== undefined && dto.email !== caller.email) {
      const owner = await this.userStore.findByEmail(dto.email);
      if (owner) {
        throw ERRORS.UserAlreadyExists('email');
      }
    }

    const updated = await this.userStore.updateProfile(caller.id, {
      email: dto.email,
      full_name: dto.full_name,
    });
    this.logger.log(`Profile updated: ${caller.id}`);
    return toUserProfile(updated);
  }

  async changePassword(caller: Identity, dto: ChangePasswordDto): Promise<void> {
    const isValid = await this.passwordService.verify(dto.current_password, caller.password_hash);
    if (!isValid) {
      throw ERRORS.InvalidCredentials();
    }

    const passwordHash = await this.passwordService.hash(dto.new_password);
    await this.userStore.updatePasswordHash(caller.id, passwordHash);
    this.logger.log(`Password changed: ${caller.id}`);
  }

  async deactivate(userId: string): Promise<UserProfile> {
    const identity = await this.userStore.findById(userId);
    if (!identity) {
      throw ERRORS.UserNotFound(userId);
    }

    await this.userStore.setActive(userId, false);
    this.logger.log(`User deactivated: ${userId}`);
    return toUserProfile({ ...identity, is_active: false });
  }

  /**
   * Taken email or username is reported before paying for a hash; the store's
   * unique constraints still decide concurrent registrations
   */
  private async createIdentity(dto: RegisterUserDto, role: UserRole): Promise<Identity> {
    if (await this.userStore.findByEmail(dto.email)) {
      throw ERRORS.UserAlreadyExists('email');
    }
    if (await this.userStore.findByUsername(dto.username)) {
      throw ERRORS.UserAlreadyExists('username');
    }

    const passwordHash = await this.passwordService.hash(dto.password);

    return this.userStore.create({
      email: dto.email,
      username: dto.username,
      full_name: dto.full_name ?? '',
      password_hash: passwordHash,
      role,
      is_active: true,
    });
  }
}
