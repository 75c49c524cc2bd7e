import type { MiddlewareHandler } from 'hono';
import {
  HEADER_ORIGIN,
  HEADER_SEC_FETCH_SITE,
  HEADER_WWW_AUTHENTICATE,
  TRANSMISSION_HEADER,
} from '../config/constants.js';
import { withRetry, type RetryOptions } from '../services/retry.js';
import type { SessionManager } from '../services/session-manager.js';
import type { Clock } from '../types/clock.js';
import type { SessionVariables } from '../types/hono.js';
import {
  readSessionToken,
  writeSessionCookie,
  type SessionTransportOptions,
} from './session-transport.js';

export interface SessionAuthOptions {
  manager: SessionManager;
  transport: SessionTransportOptions;
  retry: RetryOptions;
  clock: Clock;
}

/**
 * Middleware that requires a live session
 *
 * Sets `session` and `sessionToken` in context variables on success. With
 * sliding expiration the cookie is re-issued with the extended expiry.
 */
export function requireSession(options: SessionAuthOptions): MiddlewareHandler<{
  Variables: SessionVariables;
}> {
  const { manager, transport, retry, clock } = options;

  return async (c, next) => {
    const token = readSessionToken(c, transport);

    const result = await withRetry(
      () =>
        manager.verifyRequest({
          token,
          transport: transport.transmission,
          origin: c.req.header(HEADER_ORIGIN),
          fetchSite: c.req.header(HEADER_SEC_FETCH_SITE),
        }),
      retry
    );

    if (!result.ok) {
      if (transport.transmission === TRANSMISSION_HEADER && result.error.statusCode === 401) {
        c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_token"');
      }
      throw result.error;
    }

    // verifyRequest only succeeds with a token present
    if (token && transport.transmission !== TRANSMISSION_HEADER && manager.usesSlidingExpiration) {
      writeSessionCookie(c, transport, token, result.value.expiresAt, clock.now());
    }

    c.set('session', result.value);
    c.set('sessionToken', token);

    await next();
  };
}
