import { describe, it, expect, beforeEach } from 'vitest';
import type {
  IssueAuthorizationTokenResponse,
  VerifyAuthorizationTokenResponse,
} from '@session-warden/shared';
import {
  setupTestContext,
  setCookieValue,
  jsonRequest,
  APP_ORIGIN,
  TEST_EMAIL,
  TEST_PASSWORD,
  type TestContext,
} from './test-setup.js';

describe('Authorization tokens', () => {
  let ctx: TestContext;
  let sessionHeaders: Record<string, string>;

  beforeEach(async () => {
    ctx = await setupTestContext();

    const res = await ctx.app.request(
      '/sessions',
      jsonRequest('POST', { email: TEST_EMAIL, password: TEST_PASSWORD }, { Origin: APP_ORIGIN })
    );
    sessionHeaders = { Cookie: `__session=${setCookieValue(res, '__session') ?? ''}`, Origin: APP_ORIGIN };
  });

  async function issue(body: { purpose: string; oneTime?: boolean }): Promise<IssueAuthorizationTokenResponse> {
    const res = await ctx.app.request('/authorization-tokens', jsonRequest('POST', body, sessionHeaders));
    expect(res.status).toBe(201);
    return (await res.json()) as IssueAuthorizationTokenResponse;
  }

  function verify(token: string, purpose: string): Response | Promise<Response> {
    return ctx.app.request('/authorization-tokens/verify', jsonRequest('POST', { token, purpose }));
  }

  it('should issue a one-time token by default', async () => {
    const issued = await issue({ purpose: 'email-verify' });

    expect(issued.purpose).toBe('email-verify');
    expect(issued.oneTime).toBe(true);
    expect(issued.expiresAt).toBe('2026-03-01T13:00:00.000Z');
    expect(issued.token).toMatch(/^[A-Za-z0-9_-]{64}$/);
  });

  it('should require a session to issue', async () => {
    const res = await ctx.app.request(
      '/authorization-tokens',
      jsonRequest('POST', { purpose: 'email-verify' }, { Origin: APP_ORIGIN })
    );

    expect(res.status).toBe(401);
  });

  it('should consume a one-time token on first verification', async () => {
    const { token } = await issue({ purpose: 'email-verify' });

    const first = await verify(token, 'email-verify');
    expect(first.status).toBe(200);
    const body = (await first.json()) as VerifyAuthorizationTokenResponse;
    expect(body).toEqual({
      subjectId: ctx.subjectId.toString(),
      purpose: 'email-verify',
      expiresAt: '2026-03-01T13:00:00.000Z',
    });

    const second = await verify(token, 'email-verify');
    expect(second.status).toBe(401);
    expect(await second.json()).toEqual({ error: 'unauthorized' });
  });

  it('should allow a reusable token to be verified repeatedly', async () => {
    const { token } = await issue({ purpose: 'invite', oneTime: false });

    expect((await verify(token, 'invite')).status).toBe(200);
    expect((await verify(token, 'invite')).status).toBe(200);
  });

  it('should not verify a token under another purpose', async () => {
    const { token } = await issue({ purpose: 'email-verify' });

    expect((await verify(token, 'password-reset')).status).toBe(401);
    // The failed attempt did not consume it
    expect((await verify(token, 'email-verify')).status).toBe(200);
  });

  it('should not accept a session token as an authorization token', async () => {
    const sessionToken = sessionHeaders['Cookie']?.slice('__session='.length) ?? '';

    expect((await verify(sessionToken, 'email-verify')).status).toBe(401);
  });

  it('should reject an expired token', async () => {
    const { token } = await issue({ purpose: 'email-verify' });

    ctx.clock.advance(3600);

    expect((await verify(token, 'email-verify')).status).toBe(401);
  });

  it('should reject an invalid purpose', async () => {
    const res = await ctx.app.request(
      '/authorization-tokens',
      jsonRequest('POST', { purpose: 'has spaces' }, sessionHeaders)
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'invalid_request' });
  });
});
