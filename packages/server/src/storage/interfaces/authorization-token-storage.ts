import type { AuthorizationTokenId } from '../../types/identifier.js';
import type { AuthorizationTokenRecord } from '../../types/session.js';

/**
 * Storage interface for purpose-bound authorization tokens
 */
export interface IAuthorizationTokenStorage {
  /**
   * Insert a token record
   * Throws AuthError `duplicate_id` if the id already exists
   */
  put(record: AuthorizationTokenRecord): Promise<void>;

  /**
   * Find a live token record by id
   */
  get(id: AuthorizationTokenId): Promise<AuthorizationTokenRecord | null>;

  /**
   * Delete a token record
   * Returns true only if this call removed a live record, so two concurrent
   * consumers of a one-time token cannot both succeed
   */
  delete(id: AuthorizationTokenId): Promise<boolean>;

  /**
   * Delete expired records (cleanup)
   */
  deleteExpired(): Promise<number>;
}
