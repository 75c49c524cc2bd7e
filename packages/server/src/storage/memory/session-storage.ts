import type { AccountId, SessionId } from '../../types/identifier.js';
import type { SessionRecord } from '../../types/session.js';
import { type Clock, systemClock } from '../../types/clock.js';
import type { ISessionStorage } from '../interfaces/session-storage.js';
import { AuthError } from '../../errors/auth-error.js';

function copyRecord(record: SessionRecord): SessionRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt),
    expiresAt: new Date(record.expiresAt),
    attributes: { ...record.attributes },
  };
}

/**
 * In-memory session storage implementation
 * Reference implementation; data is lost on restart
 */
export class MemorySessionStorage implements ISessionStorage {
  private sessions = new Map<string, SessionRecord>();
  private subjectIndex = new Map<string, Set<string>>(); // subjectId -> Set<sessionId>

  constructor(private readonly clock: Clock = systemClock) {}

  async put(record: SessionRecord): Promise<void> {
    const key = record.id.toString();
    if (this.sessions.has(key)) {
      throw AuthError.duplicateId('Session id already exists');
    }

    this.sessions.set(key, copyRecord(record));

    const subjectKey = record.subjectId.toString();
    let ids = this.subjectIndex.get(subjectKey);
    if (!ids) {
      ids = new Set();
      this.subjectIndex.set(subjectKey, ids);
    }
    ids.add(key);
  }

  async get(id: SessionId): Promise<SessionRecord | null> {
    const record = this.findLive(id.toString());
    return record ? copyRecord(record) : null;
  }

  async touch(id: SessionId, newExpiresAt: Date): Promise<void> {
    const key = id.toString();
    const record = this.findLive(key);
    if (!record) {
      throw AuthError.notFound('Session not found');
    }
    this.sessions.set(key, { ...record, expiresAt: new Date(newExpiresAt) });
  }

  async delete(id: SessionId): Promise<void> {
    this.remove(id.toString());
  }

  async deleteAllForSubject(subjectId: AccountId): Promise<number> {
    const ids = this.subjectIndex.get(subjectId.toString());
    if (!ids) return 0;

    let count = 0;
    for (const key of [...ids]) {
      if (this.remove(key)) {
        count++;
      }
    }
    return count;
  }

  async deleteExpired(): Promise<number> {
    const now = this.clock.now();
    let deleted = 0;

    for (const [key, record] of this.sessions) {
      if (record.expiresAt <= now) {
        this.remove(key);
        deleted++;
      }
    }

    return deleted;
  }

  /**
   * Number of physically stored records, live or not
   */
  get size(): number {
    return this.sessions.size;
  }

  private findLive(key: string): SessionRecord | null {
    const record = this.sessions.get(key);
    if (!record || record.expiresAt <= this.clock.now()) {
      return null;
    }
    return record;
  }

  private remove(key: string): boolean {
    const record = this.sessions.get(key);
    if (!record) return false;

    this.sessions.delete(key);

    const subjectKey = record.subjectId.toString();
    const ids = this.subjectIndex.get(subjectKey);
    ids?.delete(key);
    if (ids && ids.size === 0) {
      this.subjectIndex.delete(subjectKey);
    }
    return true;
  }
}
