import type { ZodError } from 'zod';
import { z } from 'zod';
import {
  MAX_PASSWORD_LENGTH,
  MAX_TOKEN_LENGTH,
  MIN_PASSWORD_LENGTH,
  PURPOSE_PATTERN,
} from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';
import type { SessionContext } from '../types/hono.js';
import type { SessionRecord } from '../types/session.js';

export const signInSchema = z.object({
  email: z.string().trim().email().max(320),
  password: z.string().min(1).max(MAX_PASSWORD_LENGTH),
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1).max(MAX_PASSWORD_LENGTH),
  newPassword: z.string().min(MIN_PASSWORD_LENGTH).max(MAX_PASSWORD_LENGTH),
});

export const issueAuthorizationTokenSchema = z.object({
  purpose: z.string().regex(PURPOSE_PATTERN),
  oneTime: z.boolean().optional(),
});

export const verifyAuthorizationTokenSchema = z.object({
  token: z.string().min(1).max(MAX_TOKEN_LENGTH),
  purpose: z.string().regex(PURPOSE_PATTERN),
});

/**
 * zValidator hook: a body that fails validation is an `invalid_request`
 */
export function rejectInvalidBody(
  result: { success: true } | { success: false; error: ZodError }
): void {
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw AuthError.invalidRequest(`Invalid request body: ${fields}`);
  }
}

/**
 * Session set by `requireSession`
 */
export function currentSession(c: SessionContext): SessionRecord {
  const session = c.get('session');
  if (!session) {
    throw AuthError.serverError('Session not resolved');
  }
  return session;
}
