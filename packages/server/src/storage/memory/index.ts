import type { IStorage } from '../interfaces/index.js';
import { type Clock, systemClock } from '../../types/clock.js';
import { MemorySessionStorage } from './session-storage.js';
import { MemoryAccountStorage } from './account-storage.js';
import { MemoryAuthorizationTokenStorage } from './authorization-token-storage.js';

export { MemorySessionStorage } from './session-storage.js';
export { MemoryAccountStorage } from './account-storage.js';
export { MemoryAuthorizationTokenStorage } from './authorization-token-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(clock: Clock = systemClock): IStorage {
  return {
    sessions: new MemorySessionStorage(clock),
    accounts: new MemoryAccountStorage(clock),
    authorizationTokens: new MemoryAuthorizationTokenStorage(clock),
  };
}
