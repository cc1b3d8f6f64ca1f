import { ErrorCode } from './error-codes';
import { DecryptoError } from './decrypto-error';

export const ERRORS = {
  // Auth errors
  Unauthenticated: () =>
    new DecryptoError({
      code: ErrorCode.Unauthenticated,
      message: 'Could not validate credentials',
      httpStatusCode: 401,
    }),

  Forbidden: () =>
    new DecryptoError({
      code: ErrorCode.Forbidden,
      message: "The user doesn't have enough privileges",
      httpStatusCode: 403,
    }),

  EventNotActive: (phase: string) =>
    new DecryptoError({
      code: ErrorCode.EventNotActive,
      message: 'This operation is only available while the event is active',
      httpStatusCode: 403,
      resource: phase,
    }),

  InvalidCredentials: () =>
    new DecryptoError({
      code: ErrorCode.InvalidCredentials,
      message: 'Incorrect email address or password',
      httpStatusCode: 401,
    }),

  RegistrationClosed: () =>
    new DecryptoError({
      code: ErrorCode.RegistrationClosed,
      message: 'Open user registration is forbidden on this server',
      httpStatusCode: 403,
    }),

  MalformedHash: (e?: Error) =>
    new DecryptoError({
      code: ErrorCode.MalformedHash,
      message: 'Stored password hash could not be parsed',
      httpStatusCode: 500,
      originalError: e,
      internal: true,
    }),

  // User errors
  UserNotFound: (userId: string) =>
    new DecryptoError({
      code: ErrorCode.UserNotFound,
      message: 'The user with this user ID does not exist in the system',
      httpStatusCode: 404,
      resource: userId,
    }),

  UserAlreadyExists: (field: 'email' | 'username', e?: Error) =>
    new DecryptoError({
      code: ErrorCode.UserAlreadyExists,
      message: `The user with this ${field} already exists in the system`,
      httpStatusCode: 409,
      resource: field,
      originalError: e,
    }),

  // Store errors
  StoreUnavailable: (operation: string, e?: Error) =>
    new DecryptoError({
      code: ErrorCode.StoreUnavailable,
      message: 'User store is temporarily unavailable',
      httpStatusCode: 503,
      metadata: { operation },
      originalError: e,
    }),

  DatabaseTimeout: (operation: string, timeoutMs: number) =>
    new DecryptoError({
      code: ErrorCode.DatabaseTimeout,
      message: `Database operation timed out: ${operation}`,
      httpStatusCode: 504,
      metadata: { operation, timeoutMs },
    }),

  // General
  ConfigurationError: (message: string) =>
    new DecryptoError({
      code: ErrorCode.ConfigurationError,
      message,
      httpStatusCode: 500,
      internal: true,
    }),

  ValidationError: (message: string, field?: string) =>
    new DecryptoError({
      code: ErrorCode.ValidationError,
      message,
      httpStatusCode: 400,
      resource: field,
    }),

  InternalError: (message: string, e?: Error) =>
    new DecryptoError({
      code: ErrorCode.InternalError,
      message: message || 'Internal server error',
      httpStatusCode: 500,
      originalError: e,
      internal: true,
    }),
};
