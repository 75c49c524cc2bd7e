import type { AccountId, SessionId } from '../../types/identifier.js';
import type { SessionRecord } from '../../types/session.js';

/**
 * Storage interface for session records
 *
 * Expiry is enforced at read time: a record with `expiresAt <= now` behaves
 * as absent for every operation, whether or not it was physically removed.
 */
export interface ISessionStorage {
  /**
   * Insert a new session record
   * Throws AuthError `duplicate_id` if the id already exists
   */
  put(record: SessionRecord): Promise<void>;

  /**
   * Find a live session record by id
   */
  get(id: SessionId): Promise<SessionRecord | null>;

  /**
   * Move the expiry of a live session (sliding expiration)
   * Throws AuthError `not_found` if the record is absent or expired
   */
  touch(id: SessionId, newExpiresAt: Date): Promise<void>;

  /**
   * Delete a session record. Deleting an absent id is not an error.
   */
  delete(id: SessionId): Promise<void>;

  /**
   * Delete every session of a subject ("sign out everywhere")
   * Returns the number of records removed
   */
  deleteAllForSubject(subjectId: AccountId): Promise<number>;

  /**
   * Delete physically present but expired records (cleanup)
   */
  deleteExpired(): Promise<number>;
}
