import { ErrorCode } from './error-codes';

export interface DecryptoErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  originalError?: Error;
  metadata?: Record<string, unknown>;
  /** Internal errors are logged with their code but rendered as a generic 500 */
  internal?: boolean;
}

export interface DecryptoErrorBody {
  error: string;
  message: string;
  statusCode: number;
  resource?: string;
}

export class DecryptoError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;
  readonly internal: boolean;

  constructor(options: DecryptoErrorOptions) {
    super(options.message);
    this.name = 'DecryptoError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.originalError = options.originalError;
    this.metadata = options.metadata;
    this.internal = options.internal ?? false;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): DecryptoErrorBody {
    if (this.internal) {
      return {
        error: ErrorCode.InternalError,
        message: 'Internal server error',
        statusCode: this.httpStatusCode,
      };
    }

    return {
      error: this.code,
      message: this.message,
      statusCode: this.httpStatusCode,
      ...(this.resource !== undefined ? { resource: this.resource } : {}),
    };
  }
}
