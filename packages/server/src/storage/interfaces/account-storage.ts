import type { AccountId } from '../../types/identifier.js';
import type { Account, CreateAccountInput } from '../../types/session.js';

/**
 * Storage interface for the account lookup the session manager needs
 */
export interface IAccountStorage {
  /**
   * Create an account
   * Throws AuthError `duplicate_id` if the credential id is taken
   */
  create(input: CreateAccountInput): Promise<Account>;

  /**
   * Find an account by its normalized credential id (email)
   */
  findByCredentialId(credentialId: string): Promise<Account | null>;

  /**
   * Find an account by id
   */
  findById(id: AccountId): Promise<Account | null>;

  /**
   * Replace the stored password hash
   * Throws AuthError `not_found` if the account does not exist
   */
  updatePasswordHash(id: AccountId, passwordHash: string): Promise<void>;
}
