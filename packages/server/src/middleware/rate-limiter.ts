import type { Context, MiddlewareHandler } from 'hono';
import type { SessionVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context) => string;
  skipSuccessfulRequests?: boolean; // Only count responses with status >= 400
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory rate limiter
 * Counters are per process; a deployment with several instances needs a
 * shared store in front of this.
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<{
  Variables: SessionVariables;
}> {
  const { windowMs, maxRequests, keyGenerator = clientAddressKey, skipSuccessfulRequests = false } =
    options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);

    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      store.set(key, entry);
    }

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Remaining', '0');
      throw AuthError.rateLimited(`Rate limit exceeded for ${key}`);
    }

    entry.count++;
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));

    await next();

    if (skipSuccessfulRequests && c.res.status < 400) {
      entry.count--;
    }
  };
}

/**
 * Default key: first forwarded address, or "unknown"
 */
function clientAddressKey(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ?? c.req.header('x-real-ip') ?? 'unknown'
  );
}

/**
 * Sign-in limiter: counts failed attempts per client address
 */
export function signInRateLimiter(
  options: Pick<RateLimiterOptions, 'windowMs' | 'maxRequests'>
): MiddlewareHandler<{ Variables: SessionVariables }> {
  return rateLimiter({
    ...options,
    keyGenerator: (c) => `sign-in:${clientAddressKey(c)}`,
    skipSuccessfulRequests: true,
  });
}
