/**
 * PostgreSQL-backed user store
 * Table: decrypto_user
 */

import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService, isSqlStateError } from '@decrypto/common/database';
import { ERRORS } from '@decrypto/common/errors';
import { Identity, NewIdentity, UserRole } from '@decrypto/common/types';
import { ProfileChanges, UserStore } from './user-store';

interface UserRow {
  id: string;
  email: string;
  username: string;
  full_name: string;
  hashed_password: string;
  role: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS =
  'id, email, username, full_name, hashed_password, role, is_active, created_at, updated_at';

@Injectable()
export class PgUserStore implements UserStore {
  private readonly logger = new Logger(PgUserStore.name);

  constructor(private databaseService: DatabaseService) {}

  async findByEmail(email: string): Promise<Identity | null> {
    const row = await this.databaseService.queryOne<UserRow>(
      `SELECT ${USER_COLUMNS} FROM decrypto_user WHERE email = $1`,
      [email],
    );
    return row ? toIdentity(row) : null;
  }

  async findByUsername(username: string): Promise<Identity | null> {
    const row = await this.databaseService.queryOne<UserRow>(
      `SELECT ${USER_COLUMNS} FROM decrypto_user WHERE username = $1`,
      [username],
    );
    return row ? toIdentity(row) : null;
  }

  async findById(id: string): Promise<Identity | null> {
    const row = await this.databaseService.queryOne<UserRow>(
      `SELECT ${USER_COLUMNS} FROM decrypto_user WHERE id = $1`,
      [id],
    );
    return row ? toIdentity(row) : null;
  }

  async list(skip: number, limit: number): Promise<Identity[]> {
    const result = await this.databaseService.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM decrypto_user ORDER BY created_at, id OFFSET $1 LIMIT $2`,
      [skip, limit],
    );
    return result.rows.map(toIdentity);
  }

  async create(identity: NewIdentity): Promise<Identity> {
    let row: UserRow | null;
    try {
      row = await this.databaseService.queryOne<UserRow>(
        `INSERT INTO decrypto_user (id, email, username, full_name, hashed_password, role, is_active, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, now(), now())
         RETURNING ${USER_COLUMNS}`,
        [
          uuidv4(),
          identity.email,
          identity.username,
          identity.full_name,
          identity.password_hash,
          identity.role,
          identity.is_active,
        ],
      );
    } catch (error) {
      throw translateUniqueViolation(error);
    }

    if (!row) {
      throw ERRORS.InternalError('User insert returned no row');
    }

    this.logger.log(`User created: ${row.id}`);
    return toIdentity(row);
  }

  async updateProfile(id: string, changes: ProfileChanges): Promise<Identity> {
    let row: UserRow | null;
    try {
      row = await this.databaseService.queryOne<UserRow>(
        `UPDATE decrypto_user
         SET email = COALESCE($2, email), full_name = COALESCE($3, full_name), updated_at = now()
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [id, changes.email ?? null, changes.full_name ?? null],
      );
    } catch (error) {
      throw translateUniqueViolation(error);
    }

    if (!row) {
      throw ERRORS.UserNotFound(id);
    }

    return toIdentity(row);
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    const result = await this.databaseService.query(
      `UPDATE decrypto_user SET hashed_password = $2, updated_at = now() WHERE id = $1`,
      [id, passwordHash],
    );
    if (result.rowCount === 0) {
      throw ERRORS.UserNotFound(id);
    }
  }

  async setActive(id: string, isActive: boolean): Promise<void> {
    const result = await this.databaseService.query(
      `UPDATE decrypto_user SET is_active = $2, updated_at = now() WHERE id = $1`,
      [id, isActive],
    );
    if (result.rowCount === 0) {
      throw ERRORS.UserNotFound(id);
    }
  }
}

function translateUniqueViolation(error: unknown): unknown {
  if (isSqlStateError(error) && error.code === '23505') {
    // Unique constraint violation
    const field = 'constraint' in error && String(error.constraint).includes('username')
      ? 'username'
      : 'email';
    return ERRORS.UserAlreadyExists(field, error);
  }
  return error;
}

function toIdentity(row: UserRow): Identity {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    full_name: row.full_name,
    password_hash: row.hashed_password,
    // Anything other than an explicit superuser role is treated as regular
    role: row.role === UserRole.SUPERUSER ? UserRole.SUPERUSER : UserRole.REGULAR,
    is_active: row.is_active,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
