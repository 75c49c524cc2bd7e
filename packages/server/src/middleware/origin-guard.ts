import type { MiddlewareHandler } from 'hono';
import { HEADER_ORIGIN, HEADER_SEC_FETCH_SITE } from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';
import type { Logger } from '../logging/logger.js';
import type { OriginPolicyGuard } from '../security/origin-policy.js';
import type { SessionVariables } from '../types/hono.js';

/**
 * Refuse requests from origins outside the allow-list before they can
 * set or clear a session cookie
 */
export function originGuard(
  guard: OriginPolicyGuard,
  logger: Logger
): MiddlewareHandler<{ Variables: SessionVariables }> {
  return async (c, next) => {
    const origin = c.req.header(HEADER_ORIGIN);
    const decision = guard.check({ origin, fetchSite: c.req.header(HEADER_SEC_FETCH_SITE) });

    if (!decision.allowed) {
      logger.info({ event: 'origin.rejected', path: c.req.path, reason: decision.reason });
      throw AuthError.originNotAllowed(origin);
    }

    await next();
  };
}
