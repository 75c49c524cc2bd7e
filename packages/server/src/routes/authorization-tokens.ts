import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type {
  IssueAuthorizationTokenResponse,
  VerifyAuthorizationTokenResponse,
} from '@session-warden/shared';
import { unwrap } from '../errors/result.js';
import type { AuthorizationTokenService } from '../services/authorization-token-service.js';
import { withRetry, type RetryOptions } from '../services/retry.js';
import type { SessionVariables } from '../types/hono.js';
import {
  currentSession,
  issueAuthorizationTokenSchema,
  rejectInvalidBody,
  verifyAuthorizationTokenSchema,
} from './validation.js';

export interface AuthorizationTokenRoutesOptions {
  tokens: AuthorizationTokenService;
  retry: RetryOptions;
  requireSession: MiddlewareHandler<{ Variables: SessionVariables }>;
}

/**
 * Create purpose-bound authorization token routes
 */
export function createAuthorizationTokenRoutes(options: AuthorizationTokenRoutesOptions) {
  const { tokens, retry, requireSession } = options;

  const router = new Hono<{ Variables: SessionVariables }>();

  // POST /authorization-tokens
  router.post(
    '/',
    requireSession,
    zValidator('json', issueAuthorizationTokenSchema, rejectInvalidBody),
    async (c) => {
      const { subjectId } = currentSession(c);
      const { purpose, oneTime } = c.req.valid('json');

      const { token, record } = unwrap(
        await withRetry(() => tokens.issue(subjectId, purpose, { oneTime }), retry)
      );

      const body: IssueAuthorizationTokenResponse = {
        token,
        purpose: record.purpose,
        oneTime: record.oneTime,
        expiresAt: record.expiresAt.toISOString(),
      };
      return c.json(body, 201);
    }
  );

  // POST /authorization-tokens/verify
  // Not retried: a one-time token may already be consumed by the failed attempt
  router.post('/verify', zValidator('json', verifyAuthorizationTokenSchema, rejectInvalidBody), async (c) => {
    const { token, purpose } = c.req.valid('json');

    const record = unwrap(await tokens.verify(token, purpose));

    const body: VerifyAuthorizationTokenResponse = {
      subjectId: record.subjectId.toString(),
      purpose: record.purpose,
      expiresAt: record.expiresAt.toISOString(),
    };
    return c.json(body);
  });

  return router;
}
