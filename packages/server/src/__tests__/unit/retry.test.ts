import { describe, it, expect, vi } from 'vitest';
import { AuthError } from '../../errors/auth-error.js';
import { err, ok, type Result } from '../../errors/result.js';
import { withRetry } from '../../services/retry.js';
import { callStore } from '../../services/store-call.js';

describe('withRetry', () => {
  const options = { attempts: 3, baseDelayMs: 0 };

  it('should return the first success', async () => {
    const operation = vi.fn(async (): Promise<Result<number>> => ok(1));

    expect(await withRetry(operation, options)).toEqual({ ok: true, value: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry store_unavailable until it succeeds', async () => {
    const operation = vi
      .fn<() => Promise<Result<number>>>()
      .mockResolvedValueOnce(err(AuthError.storeUnavailable()))
      .mockResolvedValueOnce(ok(2));

    expect(await withRetry(operation, options)).toEqual({ ok: true, value: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should stop after the configured attempts', async () => {
    const operation = vi.fn(async (): Promise<Result<number>> => err(AuthError.storeUnavailable()));

    const result = await withRetry(operation, options);

    expect(!result.ok && result.error.code).toBe('store_unavailable');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry a definitive failure', async () => {
    const operation = vi.fn(async (): Promise<Result<number>> => err(AuthError.sessionExpired()));

    await withRetry(operation, options);

    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('callStore', () => {
  it('should pass the value through', async () => {
    expect(await callStore('sessions.get', 100, async () => 'value')).toBe('value');
  });

  it('should time out a call that never settles', async () => {
    const call = callStore('sessions.get', 10, () => new Promise<string>(() => {}));

    await expect(call).rejects.toMatchObject({
      code: 'store_unavailable',
      description: 'sessions.get timed out after 10ms',
    });
  });

  it('should wrap driver errors', async () => {
    const cause = new Error('connection refused');

    await expect(
      callStore('sessions.put', 100, async () => {
        throw cause;
      })
    ).rejects.toMatchObject({ code: 'store_unavailable', cause });
  });

  it('should wrap synchronous throws', async () => {
    await expect(
      callStore('sessions.put', 100, () => {
        throw new Error('boom');
      })
    ).rejects.toMatchObject({ code: 'store_unavailable', description: 'sessions.put failed' });
  });

  it('should let store AuthErrors through', async () => {
    const duplicate = AuthError.duplicateId('Session id already exists');

    await expect(
      callStore('sessions.put', 100, async () => {
        throw duplicate;
      })
    ).rejects.toBe(duplicate);
  });
});
