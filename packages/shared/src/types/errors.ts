/**
 * Coarse reasons exposed to API callers.
 * The specific internal condition is only ever logged.
 */
export type PublicErrorReason =
  | 'invalid_request'
  | 'unauthorized'
  | 'forbidden'
  | 'rate_limited'
  | 'unavailable'
  | 'server_error';

/**
 * Error response body
 */
export interface ErrorResponse {
  error: PublicErrorReason;
}
