import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:crypto', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:crypto')>();
  return { ...actual, timingSafeEqual: vi.fn(actual.timingSafeEqual) };
});

import { timingSafeEqual } from 'node:crypto';
import { HmacSigner } from '../../crypto/signer.js';
import { AuthError } from '../../errors/auth-error.js';
import { TEST_PREVIOUS_KEY, TEST_SIGNING_KEY } from '../test-utils.js';

const message = Buffer.from('session-identifier', 'utf8');

describe('HmacSigner', () => {
  beforeEach(() => {
    vi.mocked(timingSafeEqual).mockClear();
  });

  it('should produce deterministic signatures of the algorithm length', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });

    const first = signer.sign(message);
    const second = signer.sign(message);

    expect(first).toHaveLength(32);
    expect(first.equals(second)).toBe(true);
    expect(new HmacSigner({ currentKey: TEST_SIGNING_KEY, algorithm: 'sha512' }).sign(message)).toHaveLength(64);
  });

  it('should verify its own signatures', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });

    expect(signer.verify(message, signer.sign(message))).toBe(true);
  });

  it('should reject a signature over another message', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });

    expect(signer.verify(Buffer.from('other-identifier'), signer.sign(message))).toBe(false);
  });

  it('should reject a signature with one bit flipped', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });
    const signature = signer.sign(message);
    signature[31] = (signature[31] ?? 0) ^ 0x01;

    expect(signer.verify(message, signature)).toBe(false);
  });

  it('should reject a signature made with another key', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });
    const other = new HmacSigner({ currentKey: TEST_PREVIOUS_KEY });

    expect(signer.verify(message, other.sign(message))).toBe(false);
  });

  it('should accept signatures from a previous key after rotation', () => {
    const before = new HmacSigner({ currentKey: TEST_PREVIOUS_KEY });
    const after = new HmacSigner({ currentKey: TEST_SIGNING_KEY, previousKeys: [TEST_PREVIOUS_KEY] });

    expect(after.verify(message, before.sign(message))).toBe(true);
    // New signatures use the current key only
    expect(before.verify(message, after.sign(message))).toBe(false);
  });

  it('should throw on a signature of the wrong length', () => {
    const signer = new HmacSigner({ currentKey: TEST_SIGNING_KEY });

    expect(() => signer.verify(message, Buffer.alloc(31))).toThrow(RangeError);
  });

  it('should refuse a missing, short or empty key', () => {
    const attempts = [
      () => new HmacSigner({ currentKey: undefined }),
      () => new HmacSigner({ currentKey: '' }),
      () => new HmacSigner({ currentKey: 'test-secret-too-short' }),
      () => new HmacSigner({ currentKey: TEST_SIGNING_KEY, previousKeys: [''] }),
    ];

    for (const attempt of attempts) {
      expect(attempt).toThrow(AuthError);
      try {
        attempt();
      } catch (error) {
        expect(error).toMatchObject({ code: 'invalid_key' });
      }
    }
  });

  it('should compare against every key in constant time', () => {
    const signer = new HmacSigner({
      currentKey: TEST_SIGNING_KEY,
      previousKeys: [TEST_PREVIOUS_KEY, 'test-secret-signing-key-for-sessions-9999'],
    });
    const valid = signer.sign(message);
    // Differs only in the last bit compared
    const nearMiss = Buffer.from(valid);
    const last = nearMiss.length - 1;
    nearMiss[last] = (nearMiss[last] ?? 0) ^ 0x01;
    const farMiss = Buffer.alloc(32, 0xff);

    for (const signature of [valid, nearMiss, farMiss]) {
      vi.mocked(timingSafeEqual).mockClear();
      signer.verify(message, signature);
      expect(timingSafeEqual).toHaveBeenCalledTimes(3);
    }
  });
});
