import { eq } from 'drizzle-orm';
import { AccountId } from '../../../types/identifier.js';
import type { Account, CreateAccountInput } from '../../../types/session.js';
import { type Clock, systemClock } from '../../../types/clock.js';
import type { IAccountStorage } from '../../interfaces/account-storage.js';
import { AuthError } from '../../../errors/auth-error.js';
import type { Database } from '../client.js';
import { accounts, type AccountRow } from '../schema.js';

function rowToAccount(row: AccountRow): Account {
  const id = AccountId.parse(row.id);
  if (!id) {
    throw AuthError.serverError(`Stored account ${row.id} has a malformed identifier`);
  }

  return {
    id,
    credentialId: row.credentialId,
    passwordHash: row.passwordHash,
    createdAt: row.createdAt,
  };
}

/**
 * PostgreSQL account storage implementation (drizzle-orm)
 */
export class DrizzleAccountStorage implements IAccountStorage {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  async create(input: CreateAccountInput): Promise<Account> {
    const [row] = await this.db
      .insert(accounts)
      .values({
        id: AccountId.generate().toString(),
        credentialId: input.credentialId,
        passwordHash: input.passwordHash,
        createdAt: this.clock.now(),
      })
      .onConflictDoNothing()
      .returning();

    if (!row) {
      throw AuthError.duplicateId('Credential id already registered');
    }
    return rowToAccount(row);
  }

  async findByCredentialId(credentialId: string): Promise<Account | null> {
    const [row] = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.credentialId, credentialId))
      .limit(1);
    return row ? rowToAccount(row) : null;
  }

  async findById(id: AccountId): Promise<Account | null> {
    const [row] = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.id, id.toString()))
      .limit(1);
    return row ? rowToAccount(row) : null;
  }

  async updatePasswordHash(id: AccountId, passwordHash: string): Promise<void> {
    const updated = await this.db
      .update(accounts)
      .set({ passwordHash })
      .where(eq(accounts.id, id.toString()))
      .returning({ id: accounts.id });

    if (updated.length === 0) {
      throw AuthError.notFound('Account not found');
    }
  }
}
