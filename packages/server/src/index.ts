// Programmatic use
export { createSessionServer, type SessionServer, type SessionServerOptions } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export {
  createDrizzleStorage,
  initializeDatabase,
  closeDatabase,
  migrateDatabase,
  MIGRATIONS_FOLDER,
} from './storage/drizzle/index.js';
export { SessionManager, normalizeCredentialId } from './services/session-manager.js';
export type { StartSessionOptions, StartedSession, VerifyRequestInput } from './services/session-manager.js';
export { AuthorizationTokenService } from './services/authorization-token-service.js';
export { AccountService } from './services/account-service.js';
export { withRetry, type RetryOptions } from './services/retry.js';
export { OriginPolicyGuard } from './security/origin-policy.js';
export { createLogger, createSilentLogger, type Logger } from './logging/logger.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
