/**
 * Decrypto configuration shape
 * Loaded once at startup and never re-read per request
 */

export interface PasswordHashingConfig {
  timeCost: number;
  memoryCost: number; // KiB
  parallelism: number;
}

export interface EventWindowConfig {
  start: Date;
  end: Date;
}

export interface FirstSuperuserConfig {
  email: string;
  username: string;
  password: string;
  fullName: string;
}

export interface DecryptoConfig {
  port: number;
  corsOrigins: string[];

  // Database
  databaseUrl: string;
  databaseRetries: number;
  authStoreTimeoutMs: number;

  // Tokens & passwords
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  passwordHashing: PasswordHashingConfig;

  // Event
  event: EventWindowConfig;

  // Users
  firstSuperuser: FirstSuperuserConfig;
  openRegistration: boolean;
}
