import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { SignInResponse } from '@session-warden/shared';
import { TRANSMISSION_COOKIE } from '../config/constants.js';
import { unwrap } from '../errors/result.js';
import { writeSessionCookie, type SessionTransportOptions } from '../middleware/session-transport.js';
import type { AccountService } from '../services/account-service.js';
import type { SessionManager } from '../services/session-manager.js';
import type { Clock } from '../types/clock.js';
import type { SessionVariables } from '../types/hono.js';
import { changePasswordSchema, currentSession, rejectInvalidBody } from './validation.js';

export interface PasswordRoutesOptions {
  accounts: AccountService;
  manager: SessionManager;
  transport: SessionTransportOptions;
  requireSession: MiddlewareHandler<{ Variables: SessionVariables }>;
  clock: Clock;
}

/**
 * Create password change route
 *
 * A password change ends every session of the subject, including the one
 * that made the request, and hands back a fresh session.
 */
export function createPasswordRoutes(options: PasswordRoutesOptions) {
  const { accounts, manager, transport, requireSession, clock } = options;

  const router = new Hono<{ Variables: SessionVariables }>();

  // POST /password
  router.post('/', requireSession, zValidator('json', changePasswordSchema, rejectInvalidBody), async (c) => {
    const { subjectId } = currentSession(c);
    const { currentPassword, newPassword } = c.req.valid('json');

    unwrap(await accounts.changePassword(subjectId, currentPassword, newPassword));
    const { token, record } = unwrap(await manager.startSession(subjectId));

    const body: SignInResponse = { expiresAt: record.expiresAt.toISOString() };
    if (transport.transmission === TRANSMISSION_COOKIE) {
      writeSessionCookie(c, transport, token, record.expiresAt, clock.now());
    } else {
      body.token = token;
    }

    return c.json(body);
  });

  return router;
}
