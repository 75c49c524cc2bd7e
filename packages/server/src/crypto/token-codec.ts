import { IDENTIFIER_LENGTH, MAX_TOKEN_LENGTH, PURPOSE_PATTERN } from '../config/constants.js';
import type { Identifier } from '../types/identifier.js';
import { decodeBase64Url, encodeBase64Url } from './encoding.js';
import type { HmacSigner } from './signer.js';

export type DecodeResult = { ok: true; id: Buffer } | { ok: false };

const PURPOSE_SEPARATOR = Buffer.from(':', 'utf8');

export function isValidPurpose(purpose: string): boolean {
  return PURPOSE_PATTERN.test(purpose);
}

/**
 * Token codec
 *
 * Wire format: base64url( signature || identifier ), no padding, no
 * delimiters. Session tokens sign the identifier bytes; authorization tokens
 * sign `purpose ":" identifier` so a token minted for one purpose never
 * verifies for another.
 */
export class TokenCodec {
  constructor(
    private readonly signer: HmacSigner,
    private readonly identifierLength: number = IDENTIFIER_LENGTH
  ) {}

  encode(id: Identifier, purpose?: string): string {
    if (purpose !== undefined && !isValidPurpose(purpose)) {
      throw new TypeError(`Invalid token purpose: ${purpose}`);
    }

    const signature = this.signer.sign(this.message(id.bytes, purpose));
    return encodeBase64Url(Buffer.concat([signature, id.bytes]));
  }

  decode(token: string, purpose?: string): DecodeResult {
    if (token.length === 0 || token.length > MAX_TOKEN_LENGTH) {
      return { ok: false };
    }
    if (purpose !== undefined && !isValidPurpose(purpose)) {
      return { ok: false };
    }

    const raw = decodeBase64Url(token);
    const signatureLength = this.signer.signatureLength;
    if (!raw || raw.length !== signatureLength + this.identifierLength) {
      return { ok: false };
    }

    const signature = raw.subarray(0, signatureLength);
    const idBytes = raw.subarray(signatureLength);

    if (!this.signer.verify(this.message(idBytes, purpose), signature)) {
      return { ok: false };
    }

    return { ok: true, id: Buffer.from(idBytes) };
  }

  private message(idBytes: Uint8Array, purpose?: string): Uint8Array {
    if (purpose === undefined) {
      return idBytes;
    }
    return Buffer.concat([Buffer.from(purpose, 'utf8'), PURPOSE_SEPARATOR, idBytes]);
  }
}
