import type { AuthorizationTokenId } from '../../types/identifier.js';
import type { AuthorizationTokenRecord } from '../../types/session.js';
import { type Clock, systemClock } from '../../types/clock.js';
import type { IAuthorizationTokenStorage } from '../interfaces/authorization-token-storage.js';
import { AuthError } from '../../errors/auth-error.js';

/**
 * In-memory authorization token storage implementation
 */
export class MemoryAuthorizationTokenStorage implements IAuthorizationTokenStorage {
  private tokens = new Map<string, AuthorizationTokenRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async put(record: AuthorizationTokenRecord): Promise<void> {
    const key = record.id.toString();
    if (this.tokens.has(key)) {
      throw AuthError.duplicateId('Authorization token id already exists');
    }
    this.tokens.set(key, { ...record });
  }

  async get(id: AuthorizationTokenId): Promise<AuthorizationTokenRecord | null> {
    const record = this.tokens.get(id.toString());
    if (!record || record.expiresAt <= this.clock.now()) {
      return null;
    }
    return { ...record };
  }

  async delete(id: AuthorizationTokenId): Promise<boolean> {
    const key = id.toString();
    const record = this.tokens.get(key);
    if (!record) return false;

    this.tokens.delete(key);
    return record.expiresAt > this.clock.now();
  }

  async deleteExpired(): Promise<number> {
    const now = this.clock.now();
    let deleted = 0;

    for (const [key, record] of this.tokens) {
      if (record.expiresAt <= now) {
        this.tokens.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
