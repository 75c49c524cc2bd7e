import type { ErrorResponse } from '@session-warden/shared';
import {
  type AuthErrorCode,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_PUBLIC_REASONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CREDENTIALS,
  ERROR_INVALID_TOKEN,
  ERROR_SESSION_EXPIRED,
  ERROR_ORIGIN_NOT_ALLOWED,
  ERROR_RATE_LIMITED,
  ERROR_STORE_UNAVAILABLE,
  ERROR_DUPLICATE_ID,
  ERROR_NOT_FOUND,
  ERROR_INVALID_KEY,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Session service error
 *
 * `description` is for logs only; `toJSON()` never includes it.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly description: string;

  constructor(code: AuthErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether the calling layer may retry the operation
   */
  get retryable(): boolean {
    return this.code === ERROR_STORE_UNAVAILABLE;
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ErrorResponse {
    return { error: ERROR_PUBLIC_REASONS[this.code] };
  }

  // Factory methods for common errors

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static invalidCredentials(): AuthError {
    return new AuthError(ERROR_INVALID_CREDENTIALS);
  }

  static invalidToken(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, description);
  }

  static sessionExpired(description?: string): AuthError {
    return new AuthError(ERROR_SESSION_EXPIRED, description);
  }

  static originNotAllowed(origin?: string): AuthError {
    return new AuthError(
      ERROR_ORIGIN_NOT_ALLOWED,
      origin ? `Origin ${origin} is not in the allow-list` : undefined
    );
  }

  static rateLimited(description?: string): AuthError {
    return new AuthError(ERROR_RATE_LIMITED, description);
  }

  static storeUnavailable(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_STORE_UNAVAILABLE, description, { cause });
  }

  static duplicateId(description?: string): AuthError {
    return new AuthError(ERROR_DUPLICATE_ID, description);
  }

  static notFound(description?: string): AuthError {
    return new AuthError(ERROR_NOT_FOUND, description);
  }

  static invalidKey(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_KEY, description);
  }

  static serverError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
