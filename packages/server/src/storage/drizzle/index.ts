import type { IStorage } from '../interfaces/index.js';
import { type Clock, systemClock } from '../../types/clock.js';
import type { Database } from './client.js';
import { DrizzleSessionStorage } from './repositories/session-repository.js';
import { DrizzleAccountStorage } from './repositories/account-repository.js';
import { DrizzleAuthorizationTokenStorage } from './repositories/authorization-token-repository.js';

export { DrizzleSessionStorage } from './repositories/session-repository.js';
export { DrizzleAccountStorage } from './repositories/account-repository.js';
export { DrizzleAuthorizationTokenStorage } from './repositories/authorization-token-repository.js';
export {
  initializeDatabase,
  closeDatabase,
  migrateDatabase,
  type Database,
  type DatabaseOptions,
} from './client.js';
export { MIGRATIONS_FOLDER } from './migrate.js';

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createDrizzleStorage(db: Database, clock: Clock = systemClock): IStorage {
  return {
    sessions: new DrizzleSessionStorage(db, clock),
    accounts: new DrizzleAccountStorage(db, clock),
    authorizationTokens: new DrizzleAuthorizationTokenStorage(db, clock),
  };
}
