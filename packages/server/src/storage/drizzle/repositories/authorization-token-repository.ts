import { and, eq, gt, lte } from 'drizzle-orm';
import { AccountId, AuthorizationTokenId } from '../../../types/identifier.js';
import type { AuthorizationTokenRecord } from '../../../types/session.js';
import { type Clock, systemClock } from '../../../types/clock.js';
import type { IAuthorizationTokenStorage } from '../../interfaces/authorization-token-storage.js';
import { AuthError } from '../../../errors/auth-error.js';
import type { Database } from '../client.js';
import { authorizationTokens, type AuthorizationTokenRow } from '../schema.js';

function rowToAuthorizationToken(row: AuthorizationTokenRow): AuthorizationTokenRecord {
  const id = AuthorizationTokenId.parse(row.id);
  const subjectId = AccountId.parse(row.subjectId);
  if (!id || !subjectId) {
    throw AuthError.serverError(`Stored authorization token ${row.id} has a malformed identifier`);
  }

  return {
    id,
    subjectId,
    purpose: row.purpose,
    oneTime: row.oneTime,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
  };
}

/**
 * PostgreSQL authorization token storage implementation (drizzle-orm)
 */
export class DrizzleAuthorizationTokenStorage implements IAuthorizationTokenStorage {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  async put(record: AuthorizationTokenRecord): Promise<void> {
    const inserted = await this.db
      .insert(authorizationTokens)
      .values({
        id: record.id.toString(),
        subjectId: record.subjectId.toString(),
        purpose: record.purpose,
        oneTime: record.oneTime,
        createdAt: record.createdAt,
        expiresAt: record.expiresAt,
      })
      .onConflictDoNothing({ target: authorizationTokens.id })
      .returning({ id: authorizationTokens.id });

    if (inserted.length === 0) {
      throw AuthError.duplicateId('Authorization token id already exists');
    }
  }

  async get(id: AuthorizationTokenId): Promise<AuthorizationTokenRecord | null> {
    const [row] = await this.db
      .select()
      .from(authorizationTokens)
      .where(
        and(
          eq(authorizationTokens.id, id.toString()),
          gt(authorizationTokens.expiresAt, this.clock.now())
        )
      )
      .limit(1);

    return row ? rowToAuthorizationToken(row) : null;
  }

  async delete(id: AuthorizationTokenId): Promise<boolean> {
    // A single DELETE ... RETURNING: of two concurrent consumers only one
    // gets the row back
    const deleted = await this.db
      .delete(authorizationTokens)
      .where(
        and(
          eq(authorizationTokens.id, id.toString()),
          gt(authorizationTokens.expiresAt, this.clock.now())
        )
      )
      .returning({ id: authorizationTokens.id });
    return deleted.length > 0;
  }

  async deleteExpired(): Promise<number> {
    const deleted = await this.db
      .delete(authorizationTokens)
      .where(lte(authorizationTokens.expiresAt, this.clock.now()))
      .returning({ id: authorizationTokens.id });
    return deleted.length;
  }
}
