import { createHmac, timingSafeEqual } from 'node:crypto';
import {
  MIN_SIGNING_KEY_LENGTH,
  SIGNATURE_LENGTHS,
  SIGNING_ALGORITHM_SHA256,
  type SigningAlgorithm,
} from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';

export type SigningKeyInput = string | Uint8Array;

export interface SignerOptions {
  /**
   * Key used for signing and verification
   */
  currentKey: SigningKeyInput | undefined;
  /**
   * Keys retired by rotation; still accepted for verification so tokens
   * signed before the rotation stay valid until they expire
   */
  previousKeys?: readonly SigningKeyInput[];
  algorithm?: SigningAlgorithm;
}

function toKeyBuffer(key: SigningKeyInput): Buffer {
  return typeof key === 'string' ? Buffer.from(key, 'utf8') : Buffer.from(key);
}

/**
 * HMAC signer with key rotation
 *
 * Keys are supplied at construction and never leave the instance.
 */
export class HmacSigner {
  readonly algorithm: SigningAlgorithm;
  readonly signatureLength: number;
  private readonly current: Buffer;
  private readonly keys: readonly Buffer[];

  constructor(options: SignerOptions) {
    const { currentKey, previousKeys = [], algorithm = SIGNING_ALGORITHM_SHA256 } = options;

    if (currentKey === undefined || currentKey.length === 0) {
      throw AuthError.invalidKey('Signing key is not configured');
    }

    const current = toKeyBuffer(currentKey);
    if (current.length < MIN_SIGNING_KEY_LENGTH) {
      throw AuthError.invalidKey(`Signing key must be at least ${MIN_SIGNING_KEY_LENGTH} bytes`);
    }

    const previous = previousKeys.map(toKeyBuffer);
    if (previous.some((key) => key.length === 0)) {
      throw AuthError.invalidKey('Previous signing keys must not be empty');
    }

    this.algorithm = algorithm;
    this.signatureLength = SIGNATURE_LENGTHS[algorithm];
    this.current = current;
    this.keys = [current, ...previous];
  }

  /**
   * Sign a message with the current key
   */
  sign(message: Uint8Array): Buffer {
    return this.mac(this.current, message);
  }

  /**
   * Verify a signature against every configured key
   *
   * All keys are tried even after a match, and each comparison is
   * constant-time. Throws only when the signature has the wrong length.
   */
  verify(message: Uint8Array, signature: Uint8Array): boolean {
    if (signature.length !== this.signatureLength) {
      throw new RangeError(
        `Signature must be ${this.signatureLength} bytes, got ${signature.length}`
      );
    }

    let matched = false;
    for (const key of this.keys) {
      if (timingSafeEqual(this.mac(key, message), signature)) {
        matched = true;
      }
    }
    return matched;
  }

  private mac(key: Buffer, message: Uint8Array): Buffer {
    return createHmac(this.algorithm, key).update(message).digest();
  }
}
