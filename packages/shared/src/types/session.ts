/**
 * How the session token travels between client and server
 */
export type TransmissionMode = 'cookie' | 'header';

/**
 * SameSite attribute for the session cookie
 */
export type CookieSameSite = 'Strict' | 'Lax' | 'None';

/**
 * Public view of a session record
 * Timestamps are ISO 8601 strings
 */
export interface SessionView {
  subjectId: string;
  createdAt: string;
  expiresAt: string;
  attributes: Record<string, unknown>;
}

/**
 * Sign-in request body
 */
export interface SignInRequest {
  email: string;
  password: string;
}

/**
 * Sign-in response
 * `token` is only present in header transmission mode
 */
export interface SignInResponse {
  token?: string;
  expiresAt: string;
}

/**
 * Password change request body
 */
export interface ChangePasswordRequest {
  currentPassword: string;
  newPassword: string;
}

/**
 * Response of "sign out everywhere"
 */
export interface RevokeAllResponse {
  revoked: number;
}
