import { AuthError } from '../errors/index.js';

/**
 * Run a store call under a deadline
 *
 * A timeout or driver failure becomes `store_unavailable`. AuthErrors raised
 * by the store itself (`duplicate_id`, `not_found`) pass through unchanged.
 */
export async function callStore<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(AuthError.storeUnavailable(`${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(call), deadline]);
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    throw AuthError.storeUnavailable(`${operation} failed`, error);
  } finally {
    clearTimeout(timer);
  }
}
