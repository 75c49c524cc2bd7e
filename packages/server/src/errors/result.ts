import { AuthError } from './auth-error.js';

/**
 * Outcome of an operation whose failures are part of normal control flow
 * (wrong password, forged token, expired session).
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AuthError): Result<T> {
  return { ok: false, error };
}

/**
 * Unwrap a result at a boundary that reports failures by throwing
 * (HTTP handlers).
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Run an async operation, turning a thrown `AuthError` into a failed result.
 * Anything else is a bug and keeps propagating.
 */
export async function capture<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (error instanceof AuthError) {
      return err(error);
    }
    throw error;
  }
}
