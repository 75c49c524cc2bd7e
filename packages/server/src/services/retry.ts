import { setTimeout as sleep } from 'node:timers/promises';
import type { Result } from '../errors/index.js';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
}

/**
 * Re-run an operation while it fails with a retryable error
 * (`store_unavailable`), doubling the delay between attempts.
 * Returns the last result once attempts run out.
 */
export async function withRetry<T>(
  operation: () => Promise<Result<T>>,
  options: RetryOptions
): Promise<Result<T>> {
  let result = await operation();

  for (let attempt = 1; attempt < options.attempts; attempt++) {
    if (result.ok || !result.error.retryable) {
      return result;
    }
    await sleep(options.baseDelayMs * 2 ** (attempt - 1));
    result = await operation();
  }

  return result;
}
