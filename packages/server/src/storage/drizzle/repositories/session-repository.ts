import { and, eq, gt, lte } from 'drizzle-orm';
import { AccountId, SessionId } from '../../../types/identifier.js';
import type { SessionRecord } from '../../../types/session.js';
import { type Clock, systemClock } from '../../../types/clock.js';
import type { ISessionStorage } from '../../interfaces/session-storage.js';
import { AuthError } from '../../../errors/auth-error.js';
import type { Database } from '../client.js';
import { sessions, type SessionRow } from '../schema.js';

function rowToSessionRecord(row: SessionRow): SessionRecord {
  const id = SessionId.parse(row.id);
  const subjectId = AccountId.parse(row.subjectId);
  if (!id || !subjectId) {
    throw AuthError.serverError(`Stored session ${row.id} has a malformed identifier`);
  }

  return {
    id,
    subjectId,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
    attributes: row.attributes,
  };
}

/**
 * PostgreSQL session storage implementation (drizzle-orm)
 */
export class DrizzleSessionStorage implements ISessionStorage {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  async put(record: SessionRecord): Promise<void> {
    const inserted = await this.db
      .insert(sessions)
      .values({
        id: record.id.toString(),
        subjectId: record.subjectId.toString(),
        createdAt: record.createdAt,
        expiresAt: record.expiresAt,
        attributes: record.attributes,
      })
      .onConflictDoNothing({ target: sessions.id })
      .returning({ id: sessions.id });

    if (inserted.length === 0) {
      throw AuthError.duplicateId('Session id already exists');
    }
  }

  async get(id: SessionId): Promise<SessionRecord | null> {
    const [row] = await this.db
      .select()
      .from(sessions)
      .where(and(eq(sessions.id, id.toString()), gt(sessions.expiresAt, this.clock.now())))
      .limit(1);

    return row ? rowToSessionRecord(row) : null;
  }

  async touch(id: SessionId, newExpiresAt: Date): Promise<void> {
    const updated = await this.db
      .update(sessions)
      .set({ expiresAt: newExpiresAt })
      .where(and(eq(sessions.id, id.toString()), gt(sessions.expiresAt, this.clock.now())))
      .returning({ id: sessions.id });

    if (updated.length === 0) {
      throw AuthError.notFound('Session not found');
    }
  }

  async delete(id: SessionId): Promise<void> {
    await this.db.delete(sessions).where(eq(sessions.id, id.toString()));
  }

  async deleteAllForSubject(subjectId: AccountId): Promise<number> {
    const deleted = await this.db
      .delete(sessions)
      .where(eq(sessions.subjectId, subjectId.toString()))
      .returning({ id: sessions.id });
    return deleted.length;
  }

  async deleteExpired(): Promise<number> {
    const deleted = await this.db
      .delete(sessions)
      .where(lte(sessions.expiresAt, this.clock.now()))
      .returning({ id: sessions.id });
    return deleted.length;
  }
}
