/**
 * Decrypto token types
 */

export interface TokenClaims {
  sub: string; // identity id
  iat: number; // issued at, seconds since epoch
  exp: number; // expiration, seconds since epoch
}

export type TokenRejection = 'BadSignature' | 'Expired' | 'Malformed';

export type TokenValidation =
  | { valid: true; subject: string; claims: TokenClaims }
  | { valid: false; reason: TokenRejection };

export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface AccessTokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number; // seconds
}
