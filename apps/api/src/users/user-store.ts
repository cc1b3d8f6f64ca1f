/**
 * User store collaborator
 * The auth core reads identities and writes only password hashes and the
 * active flag through this interface.
 */

import { Identity, NewIdentity } from '@decrypto/common/types';

export const USER_STORE = Symbol('USER_STORE');

export type ProfileChanges = Partial<Pick<Identity, 'email' | 'full_name'>>;

export interface UserStore {
  findByEmail(email: string): Promise<Identity | null>;
  findByUsername(username: string): Promise<Identity | null>;
  findById(id: string): Promise<Identity | null>;

  /**
   * Oldest first
   */
  list(skip: number, limit: number): Promise<Identity[]>;

  /**
   * Throws UserAlreadyExists when the email or username is taken
   */
  create(identity: NewIdentity): Promise<Identity>;

  /**
   * Throws UserAlreadyExists when the new email is taken, UserNotFound for unknown ids
   */
  updateProfile(id: string, changes: ProfileChanges): Promise<Identity>;

  updatePasswordHash(id: string, passwordHash: string): Promise<void>;
  setActive(id: string, isActive: boolean): Promise<void>;
}
