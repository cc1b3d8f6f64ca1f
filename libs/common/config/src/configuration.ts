/**
 * Decrypto Configuration
 * Environment variables are parsed and validated here, once.
 * Any invalid or missing required value is a ConfigurationError.
 */

import { isEmail } from 'class-validator';
import { ERRORS } from '@decrypto/common/errors';
import { DecryptoConfig } from './config.types';

type Env = Record<string, string | undefined>;

// ISO-8601 date-time with an explicit offset (Z or ±HH:MM)
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

function required(env: Env, name: string): string {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    throw ERRORS.ConfigurationError(`${name} must be provided`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw ERRORS.ConfigurationError(`${name} must be an integer >= ${min} (got '${raw}')`);
  }
  return value;
}

function boolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw ERRORS.ConfigurationError(`${name} must be a boolean (got '${raw}')`);
  }
}

function timestamp(env: Env, name: string): Date {
  const raw = required(env, name).trim();
  const millis = Date.parse(raw);

  if (!ISO_WITH_OFFSET.test(raw) || Number.isNaN(millis)) {
    throw ERRORS.ConfigurationError(
      `${name} must be an ISO-8601 timestamp with offset (got '${raw}')`,
    );
  }
  return new Date(millis);
}

export function buildConfiguration(env: Env): DecryptoConfig {
  const start = timestamp(env, 'EVENT_START_TIME');
  const end = timestamp(env, 'EVENT_END_TIME');
  if (start.getTime() >= end.getTime()) {
    throw ERRORS.ConfigurationError(
      'EVENT_END_TIME must be a later point in time than EVENT_START_TIME',
    );
  }

  const superuserEmail = required(env, 'FIRST_SUPERUSER');
  if (!isEmail(superuserEmail)) {
    throw ERRORS.ConfigurationError('FIRST_SUPERUSER must be an email address');
  }

  return {
    port: integer(env, 'PORT', 8000),
    corsOrigins: (env.CORS_ORIGIN ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),

    // Database Configuration
    databaseUrl: required(env, 'DATABASE_URL'),
    databaseRetries: integer(env, 'DATABASE_RETRIES', 2, 0),
    authStoreTimeoutMs: integer(env, 'AUTH_STORE_TIMEOUT_MS', 5000),

    // Secrets & tokens (REQUIRED - no defaults for security)
    jwtSecret: required(env, 'SECRET_KEY'),
    accessTokenTtlSeconds: integer(env, 'ACCESS_TOKEN_EXPIRE_MINUTES', 60 * 24 * 8) * 60,
    passwordHashing: {
      timeCost: integer(env, 'PASSWORD_HASH_TIME_COST', 2),
      memoryCost: integer(env, 'PASSWORD_HASH_MEMORY_COST', 65536), // 64 MB
      parallelism: integer(env, 'PASSWORD_HASH_PARALLELISM', 1),
    },

    event: { start, end },

    firstSuperuser: {
      email: superuserEmail,
      username: required(env, 'FIRST_SUPERUSER_USERNAME'),
      password: required(env, 'FIRST_SUPERUSER_PASSWORD'),
      fullName: required(env, 'FIRST_SUPERUSER_NAME'),
    },
    openRegistration: boolean(env, 'USERS_OPEN_REGISTRATION', false),
  };
}

export default (): DecryptoConfig => buildConfiguration(process.env);
