import { IDENTIFIER_LENGTH } from '../config/constants.js';
import { decodeBase64Url, encodeBase64Url } from '../crypto/encoding.js';
import { generateIdentifierBytes } from '../crypto/random.js';

/**
 * Opaque fixed-length random identifier
 *
 * Each kind of identifier is its own subclass with a literal `kind`, so a
 * `SessionId` cannot be passed where an `AccountId` is expected. The wire and
 * storage form is base64url without padding.
 */
export abstract class Identifier {
  abstract readonly kind: string;
  readonly bytes: Buffer;

  protected constructor(bytes: Uint8Array) {
    if (bytes.length !== IDENTIFIER_LENGTH) {
      throw new RangeError(`Identifier must be ${IDENTIFIER_LENGTH} bytes, got ${bytes.length}`);
    }
    this.bytes = Buffer.from(bytes);
  }

  equals(other: Identifier): boolean {
    return this.kind === other.kind && this.bytes.equals(other.bytes);
  }

  toString(): string {
    return encodeBase64Url(this.bytes);
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Decode the wire form of an identifier; null unless it is the canonical
 * encoding of exactly IDENTIFIER_LENGTH bytes
 */
function parseBytes(value: string): Buffer | null {
  const bytes = decodeBase64Url(value);
  if (!bytes || bytes.length !== IDENTIFIER_LENGTH) {
    return null;
  }
  return bytes;
}

export class SessionId extends Identifier {
  readonly kind = 'session' as const;

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static generate(): SessionId {
    return new SessionId(generateIdentifierBytes());
  }

  static fromBytes(bytes: Uint8Array): SessionId {
    return new SessionId(bytes);
  }

  static parse(value: string): SessionId | null {
    const bytes = parseBytes(value);
    return bytes ? new SessionId(bytes) : null;
  }
}

export class AccountId extends Identifier {
  readonly kind = 'account' as const;

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static generate(): AccountId {
    return new AccountId(generateIdentifierBytes());
  }

  static fromBytes(bytes: Uint8Array): AccountId {
    return new AccountId(bytes);
  }

  static parse(value: string): AccountId | null {
    const bytes = parseBytes(value);
    return bytes ? new AccountId(bytes) : null;
  }
}

export class AuthorizationTokenId extends Identifier {
  readonly kind = 'authorization-token' as const;

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static generate(): AuthorizationTokenId {
    return new AuthorizationTokenId(generateIdentifierBytes());
  }

  static fromBytes(bytes: Uint8Array): AuthorizationTokenId {
    return new AuthorizationTokenId(bytes);
  }

  static parse(value: string): AuthorizationTokenId | null {
    const bytes = parseBytes(value);
    return bytes ? new AuthorizationTokenId(bytes) : null;
  }
}
