import { describe, it, expect } from 'vitest';
import { HmacSigner } from '../../crypto/signer.js';
import { TokenCodec, isValidPurpose } from '../../crypto/token-codec.js';
import { AuthorizationTokenId, SessionId } from '../../types/identifier.js';
import { TEST_PREVIOUS_KEY, TEST_SIGNING_KEY } from '../test-utils.js';

function replaceChar(token: string, index: number): string {
  const replacement = token[index] === 'A' ? 'B' : 'A';
  return `${token.slice(0, index)}${replacement}${token.slice(index + 1)}`;
}

describe('TokenCodec', () => {
  const codec = new TokenCodec(new HmacSigner({ currentKey: TEST_SIGNING_KEY }));

  it('should round-trip a session identifier', () => {
    const id = SessionId.generate();

    const token = codec.encode(id);
    const decoded = codec.decode(token);

    expect(token).toMatch(/^[A-Za-z0-9_-]{64}$/);
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(SessionId.fromBytes(decoded.id).equals(id)).toBe(true);
    }
  });

  it('should be deterministic', () => {
    const id = SessionId.generate();

    expect(codec.encode(id)).toBe(codec.encode(id));
  });

  it('should reject a token with any single character changed', () => {
    const token = codec.encode(SessionId.generate());

    for (const index of [0, 21, 42, 43, 50, 63]) {
      expect(codec.decode(replaceChar(token, index))).toEqual({ ok: false });
    }
  });

  it('should reject truncated, extended and empty tokens', () => {
    const token = codec.encode(SessionId.generate());

    expect(codec.decode(token.slice(0, -1))).toEqual({ ok: false });
    expect(codec.decode(token.slice(0, -4))).toEqual({ ok: false });
    expect(codec.decode(`${token}AAAA`)).toEqual({ ok: false });
    expect(codec.decode('')).toEqual({ ok: false });
    expect(codec.decode('A'.repeat(600))).toEqual({ ok: false });
  });

  it('should reject characters outside the base64url alphabet', () => {
    const token = codec.encode(SessionId.generate());

    expect(codec.decode(`${token.slice(0, 63)}+`)).toEqual({ ok: false });
    expect(codec.decode(`${token.slice(0, 62)}==`)).toEqual({ ok: false });
    expect(codec.decode(` ${token}`)).toEqual({ ok: false });
  });

  it('should reject a token signed with another key', () => {
    const other = new TokenCodec(new HmacSigner({ currentKey: TEST_PREVIOUS_KEY }));

    expect(codec.decode(other.encode(SessionId.generate()))).toEqual({ ok: false });
  });

  it('should accept tokens signed before a key rotation', () => {
    const before = new TokenCodec(new HmacSigner({ currentKey: TEST_PREVIOUS_KEY }));
    const after = new TokenCodec(
      new HmacSigner({ currentKey: TEST_SIGNING_KEY, previousKeys: [TEST_PREVIOUS_KEY] })
    );

    expect(after.decode(before.encode(SessionId.generate())).ok).toBe(true);
  });

  it('should produce longer tokens with SHA-512', () => {
    const wide = new TokenCodec(new HmacSigner({ currentKey: TEST_SIGNING_KEY, algorithm: 'sha512' }));
    const token = wide.encode(SessionId.generate());

    expect(token).toHaveLength(107);
    expect(wide.decode(token).ok).toBe(true);
    expect(codec.decode(token)).toEqual({ ok: false });
  });

  describe('purpose binding', () => {
    it('should only decode under the purpose it was issued for', () => {
      const token = codec.encode(AuthorizationTokenId.generate(), 'email-verify');

      expect(codec.decode(token, 'email-verify').ok).toBe(true);
      expect(codec.decode(token, 'password-reset')).toEqual({ ok: false });
      expect(codec.decode(token)).toEqual({ ok: false });
    });

    it('should not decode a session token as a purpose token', () => {
      const token = codec.encode(SessionId.generate());

      expect(codec.decode(token, 'email-verify')).toEqual({ ok: false });
    });

    it('should refuse to encode an invalid purpose', () => {
      expect(() => codec.encode(AuthorizationTokenId.generate(), 'has:colon')).toThrow(TypeError);
    });

    it('should validate purposes', () => {
      expect(isValidPurpose('email-verify')).toBe(true);
      expect(isValidPurpose('password.reset_v2')).toBe(true);
      expect(isValidPurpose('')).toBe(false);
      expect(isValidPurpose('-leading')).toBe(false);
      expect(isValidPurpose('a'.repeat(65))).toBe(false);
    });
  });
});
