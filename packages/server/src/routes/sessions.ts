import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { RevokeAllResponse, SessionView, SignInResponse } from '@session-warden/shared';
import { TRANSMISSION_COOKIE } from '../config/constants.js';
import { unwrap } from '../errors/result.js';
import type { Logger } from '../logging/logger.js';
import { originGuard } from '../middleware/origin-guard.js';
import { signInRateLimiter } from '../middleware/rate-limiter.js';
import {
  clearSessionCookie,
  readSessionToken,
  writeSessionCookie,
  type SessionTransportOptions,
} from '../middleware/session-transport.js';
import type { OriginPolicyGuard } from '../security/origin-policy.js';
import { withRetry, type RetryOptions } from '../services/retry.js';
import type { SessionManager } from '../services/session-manager.js';
import type { Clock } from '../types/clock.js';
import type { SessionVariables } from '../types/hono.js';
import type { SessionRecord } from '../types/session.js';
import { currentSession, rejectInvalidBody, signInSchema } from './validation.js';

export interface SessionRoutesOptions {
  manager: SessionManager;
  guard: OriginPolicyGuard;
  transport: SessionTransportOptions;
  retry: RetryOptions;
  rateLimit: { windowMs: number; maxRequests: number };
  requireSession: MiddlewareHandler<{ Variables: SessionVariables }>;
  clock: Clock;
  logger: Logger;
}

export function toSessionView(record: SessionRecord): SessionView {
  return {
    subjectId: record.subjectId.toString(),
    createdAt: record.createdAt.toISOString(),
    expiresAt: record.expiresAt.toISOString(),
    attributes: record.attributes,
  };
}

/**
 * Create session routes: sign in, inspect, sign out, sign out everywhere
 */
export function createSessionRoutes(options: SessionRoutesOptions) {
  const { manager, guard, transport, retry, rateLimit, requireSession, clock, logger } = options;
  const usesCookie = transport.transmission === TRANSMISSION_COOKIE;

  const router = new Hono<{ Variables: SessionVariables }>();

  // POST /sessions
  router.post(
    '/',
    originGuard(guard, logger),
    signInRateLimiter(rateLimit),
    zValidator('json', signInSchema, rejectInvalidBody),
    async (c) => {
      const { email, password } = c.req.valid('json');

      const { token, record } = unwrap(
        await withRetry(() => manager.signIn(email, password), retry)
      );

      const body: SignInResponse = { expiresAt: record.expiresAt.toISOString() };
      if (usesCookie) {
        writeSessionCookie(c, transport, token, record.expiresAt, clock.now());
      } else {
        body.token = token;
      }

      return c.json(body, 201);
    }
  );

  // GET /sessions/current
  router.get('/current', requireSession, (c) => {
    return c.json(toSessionView(currentSession(c)));
  });

  // DELETE /sessions/current
  // Idempotent: signing out without a live session still succeeds
  router.delete('/current', originGuard(guard, logger), async (c) => {
    const token = readSessionToken(c, transport);

    if (token) {
      unwrap(await withRetry(() => manager.endSession(token), retry));
    }
    if (usesCookie) {
      clearSessionCookie(c, transport);
    }

    return c.body(null, 204);
  });

  // DELETE /sessions
  router.delete('/', requireSession, async (c) => {
    const session = currentSession(c);

    const revoked = unwrap(
      await withRetry(() => manager.endAllSessions(session.subjectId), retry)
    );
    if (usesCookie) {
      clearSessionCookie(c, transport);
    }

    const body: RevokeAllResponse = { revoked };
    return c.json(body);
  });

  return router;
}
