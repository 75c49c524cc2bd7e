import type { AccountId, AuthorizationTokenId, SessionId } from './identifier.js';

export type SessionAttributes = Record<string, unknown>;

/**
 * Session record (stored)
 *
 * A record whose `expiresAt` is not in the future is logically absent,
 * whether or not the store has physically removed it.
 */
export interface SessionRecord {
  id: SessionId;
  subjectId: AccountId;
  createdAt: Date;
  expiresAt: Date;
  attributes: SessionAttributes;
}

/**
 * Account record: only what credential verification needs
 */
export interface Account {
  id: AccountId;
  credentialId: string; // normalized email
  passwordHash: string; // self-describing encoded hash, never the secret
  createdAt: Date;
}

export interface CreateAccountInput {
  credentialId: string;
  passwordHash: string;
}

/**
 * Purpose-bound authorization token record (stored)
 */
export interface AuthorizationTokenRecord {
  id: AuthorizationTokenId;
  subjectId: AccountId;
  purpose: string;
  oneTime: boolean;
  createdAt: Date;
  expiresAt: Date;
}
