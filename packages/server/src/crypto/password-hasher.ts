import { randomBytes, scrypt as scryptCallback, timingSafeEqual } from 'node:crypto';
import * as argon2 from 'argon2';
import {
  DEFAULT_ARGON2_MEMORY_COST,
  DEFAULT_ARGON2_PARALLELISM,
  DEFAULT_ARGON2_TIME_COST,
  SCRYPT_SALT_LENGTH,
} from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Argon2id cost parameters
 */
export interface Argon2Params {
  memoryCost: number; // KiB
  timeCost: number;
  parallelism: number;
}

export const DEFAULT_ARGON2_PARAMS: Argon2Params = {
  memoryCost: DEFAULT_ARGON2_MEMORY_COST,
  timeCost: DEFAULT_ARGON2_TIME_COST,
  parallelism: DEFAULT_ARGON2_PARALLELISM,
};

/**
 * Password hashing capability consumed by the session manager
 */
export interface CredentialHasher {
  /**
   * Hash a plaintext secret with a fresh salt.
   * The result is self-describing (algorithm, parameters, salt, hash).
   */
  hash(plaintext: string): Promise<string>;

  /**
   * Verify a plaintext secret against a stored hash.
   * Resolves false for a wrong secret or an unsupported algorithm;
   * rejects only when the stored hash cannot be parsed.
   */
  verify(encodedHash: string, plaintext: string): Promise<boolean>;

  /**
   * Whether a stored hash was produced with other parameters or algorithm
   * than the ones currently configured
   */
  needsRehash(encodedHash: string): boolean;
}

const ARGON2ID_PHC_PATTERN =
  /^\$argon2id\$v=\d+\$m=\d+,t=\d+,p=\d+\$[A-Za-z0-9+/]+\$[A-Za-z0-9+/]+$/;
const OTHER_ARGON2_PATTERN = /^\$argon2(i|d)\$/;
const SCRYPT_PREFIX = '$scrypt$';

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number; maxmem: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a secret in the legacy scrypt format: $scrypt$N$r$p$salt$hash
 * Kept so stores written before the move to Argon2id can be exercised.
 */
export async function hashLegacyScrypt(secret: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const N = 16384; // CPU/memory cost
  const r = 8; // Block size
  const p = 1; // Parallelization
  const keyLength = 64;

  const hash = await scryptAsync(secret, salt, keyLength, { N, r, p, maxmem: 64 * 1024 * 1024 });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

async function verifyLegacyScrypt(encodedHash: string, secret: string): Promise<boolean> {
  const parts = encodedHash.split('$');

  // Expected format: $scrypt$N$r$p$salt$hash
  const [, , nPart, rPart, pPart, saltPart, hashPart] = parts;
  if (parts.length !== 7 || !nPart || !rPart || !pPart || !saltPart || !hashPart) {
    throw AuthError.serverError('Stored scrypt hash is malformed');
  }

  const N = parseInt(nPart, 10);
  const r = parseInt(rPart, 10);
  const p = parseInt(pPart, 10);
  // N must be a power of two greater than 1
  const validCost = Number.isInteger(N) && N > 1 && (N & (N - 1)) === 0;
  if (!validCost || !Number.isInteger(r) || r < 1 || !Number.isInteger(p) || p < 1) {
    throw AuthError.serverError('Stored scrypt hash has invalid parameters');
  }

  const salt = Buffer.from(saltPart, 'base64');
  const storedHash = Buffer.from(hashPart, 'base64');
  if (storedHash.length === 0) {
    throw AuthError.serverError('Stored scrypt hash is empty');
  }

  let derivedHash: Buffer;
  try {
    derivedHash = await scryptAsync(secret, salt, storedHash.length, {
      N,
      r,
      p,
      maxmem: 256 * N * r + 1024 * 1024,
    });
  } catch (error) {
    throw AuthError.serverError('Stored scrypt hash has invalid parameters', error);
  }

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Argon2id credential hasher
 *
 * The argon2 binding runs on the libuv thread pool, so hashing does not block
 * the event loop.
 */
export class Argon2CredentialHasher implements CredentialHasher {
  private readonly params: Argon2Params;

  constructor(params: Partial<Argon2Params> = {}) {
    this.params = { ...DEFAULT_ARGON2_PARAMS, ...params };
  }

  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, {
      type: argon2.argon2id,
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }

  async verify(encodedHash: string, plaintext: string): Promise<boolean> {
    if (encodedHash.startsWith(SCRYPT_PREFIX)) {
      return verifyLegacyScrypt(encodedHash, plaintext);
    }

    if (OTHER_ARGON2_PATTERN.test(encodedHash)) {
      return false;
    }

    if (!ARGON2ID_PHC_PATTERN.test(encodedHash)) {
      throw AuthError.serverError('Stored credential hash is not a recognized format');
    }

    try {
      return await argon2.verify(encodedHash, plaintext);
    } catch (error) {
      throw AuthError.serverError('Stored Argon2 hash could not be verified', error);
    }
  }

  needsRehash(encodedHash: string): boolean {
    if (!ARGON2ID_PHC_PATTERN.test(encodedHash)) {
      return true;
    }

    return argon2.needsRehash(encodedHash, {
      memoryCost: this.params.memoryCost,
      timeCost: this.params.timeCost,
      parallelism: this.params.parallelism,
    });
  }
}
