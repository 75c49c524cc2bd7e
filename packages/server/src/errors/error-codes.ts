import type { PublicErrorReason } from '@session-warden/shared';

/**
 * Session service error codes
 *
 * Codes are internal: they are logged, but callers only ever see the
 * coarse public reason each code maps to.
 */

// Request errors
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;

// Authentication / authorization errors
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_SESSION_EXPIRED = 'session_expired' as const;
export const ERROR_ORIGIN_NOT_ALLOWED = 'origin_not_allowed' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;

// Infrastructure errors
export const ERROR_STORE_UNAVAILABLE = 'store_unavailable' as const;
export const ERROR_DUPLICATE_ID = 'duplicate_id' as const;
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_INVALID_KEY = 'invalid_key' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All error codes
 */
export type AuthErrorCode =
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_SESSION_EXPIRED
  | typeof ERROR_ORIGIN_NOT_ALLOWED
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_STORE_UNAVAILABLE
  | typeof ERROR_DUPLICATE_ID
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_INVALID_KEY
  | typeof ERROR_SERVER_ERROR;

export type AuthErrorStatus = 400 | 401 | 403 | 429 | 500 | 503;

/**
 * HTTP status codes for errors
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, AuthErrorStatus> = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_SESSION_EXPIRED]: 401,
  [ERROR_ORIGIN_NOT_ALLOWED]: 403,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_STORE_UNAVAILABLE]: 503,
  [ERROR_DUPLICATE_ID]: 500,
  [ERROR_NOT_FOUND]: 500,
  [ERROR_INVALID_KEY]: 500,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Public reason exposed for each code
 */
export const ERROR_PUBLIC_REASONS: Record<AuthErrorCode, PublicErrorReason> = {
  [ERROR_INVALID_REQUEST]: 'invalid_request',
  [ERROR_INVALID_CREDENTIALS]: 'unauthorized',
  [ERROR_INVALID_TOKEN]: 'unauthorized',
  [ERROR_SESSION_EXPIRED]: 'unauthorized',
  [ERROR_ORIGIN_NOT_ALLOWED]: 'forbidden',
  [ERROR_RATE_LIMITED]: 'rate_limited',
  [ERROR_STORE_UNAVAILABLE]: 'unavailable',
  [ERROR_DUPLICATE_ID]: 'server_error',
  [ERROR_NOT_FOUND]: 'server_error',
  [ERROR_INVALID_KEY]: 'server_error',
  [ERROR_SERVER_ERROR]: 'server_error',
};

/**
 * Default (internal) error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_INVALID_CREDENTIALS]: 'The credential identifier or secret is incorrect.',
  [ERROR_INVALID_TOKEN]: 'The token is malformed or its signature does not verify.',
  [ERROR_SESSION_EXPIRED]: 'The token is valid but its record is absent, expired or revoked.',
  [ERROR_ORIGIN_NOT_ALLOWED]: 'The request origin is not in the allow-list.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_STORE_UNAVAILABLE]: 'The backing store did not respond in time.',
  [ERROR_DUPLICATE_ID]: 'A record with this identifier already exists.',
  [ERROR_NOT_FOUND]: 'The record does not exist or has expired.',
  [ERROR_INVALID_KEY]: 'The signing key is missing or too short.',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition.',
};
