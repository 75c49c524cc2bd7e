import { AccountId } from '../../types/identifier.js';
import type { Account, CreateAccountInput } from '../../types/session.js';
import { type Clock, systemClock } from '../../types/clock.js';
import type { IAccountStorage } from '../interfaces/account-storage.js';
import { AuthError } from '../../errors/auth-error.js';

/**
 * In-memory account storage implementation
 */
export class MemoryAccountStorage implements IAccountStorage {
  private accounts = new Map<string, Account>();
  private credentialIndex = new Map<string, string>(); // credentialId -> accountId

  constructor(private readonly clock: Clock = systemClock) {}

  async create(input: CreateAccountInput): Promise<Account> {
    if (this.credentialIndex.has(input.credentialId)) {
      throw AuthError.duplicateId('Credential id already registered');
    }

    const account: Account = {
      id: AccountId.generate(),
      credentialId: input.credentialId,
      passwordHash: input.passwordHash,
      createdAt: this.clock.now(),
    };

    const key = account.id.toString();
    this.accounts.set(key, account);
    this.credentialIndex.set(account.credentialId, key);

    return { ...account };
  }

  async findByCredentialId(credentialId: string): Promise<Account | null> {
    const key = this.credentialIndex.get(credentialId);
    if (!key) return null;
    const account = this.accounts.get(key);
    return account ? { ...account } : null;
  }

  async findById(id: AccountId): Promise<Account | null> {
    const account = this.accounts.get(id.toString());
    return account ? { ...account } : null;
  }

  async updatePasswordHash(id: AccountId, passwordHash: string): Promise<void> {
    const key = id.toString();
    const account = this.accounts.get(key);
    if (!account) {
      throw AuthError.notFound('Account not found');
    }
    this.accounts.set(key, { ...account, passwordHash });
  }
}
