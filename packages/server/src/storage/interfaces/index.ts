export * from './session-storage.js';
export * from './account-storage.js';
export * from './authorization-token-storage.js';

import type { ISessionStorage } from './session-storage.js';
import type { IAccountStorage } from './account-storage.js';
import type { IAuthorizationTokenStorage } from './authorization-token-storage.js';

/**
 * Complete storage interface for the session service
 */
export interface IStorage {
  sessions: ISessionStorage;
  accounts: IAccountStorage;
  authorizationTokens: IAuthorizationTokenStorage;
}
