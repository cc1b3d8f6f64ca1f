/**
 * Decrypto Auth Types
 * Common types for identities and access decisions
 */

export enum UserRole {
  REGULAR = 'regular',
  SUPERUSER = 'superuser',
}

export interface Identity {
  id: string;
  email: string;
  username: string;
  full_name: string;
  password_hash: string;
  role: UserRole;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type NewIdentity = Omit<Identity, 'id' | 'created_at' | 'updated_at'>;

/**
 * Public view of an identity; never carries the password hash
 */
export interface UserProfile {
  id: string;
  email: string;
  username: string;
  full_name: string;
  is_superuser: boolean;
  is_active: boolean;
}

export function toUserProfile(identity: Identity): UserProfile {
  return {
    id: identity.id,
    email: identity.email,
    username: identity.username,
    full_name: identity.full_name,
    is_superuser: identity.role === UserRole.SUPERUSER,
    is_active: identity.is_active,
  };
}
