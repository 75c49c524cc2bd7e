import { serve } from '@hono/node-server';
import { createSessionServer } from './app.js';
import { loadConfig, type Config } from './config/index.js';
import { Argon2CredentialHasher } from './crypto/password-hasher.js';
import { ERROR_DUPLICATE_ID } from './errors/error-codes.js';
import { createLogger, type Logger } from './logging/logger.js';
import type { IStorage } from './storage/interfaces/index.js';
import { createMemoryStorage } from './storage/memory/index.js';
import {
  closeDatabase,
  createDrizzleStorage,
  initializeDatabase,
  migrateDatabase,
} from './storage/drizzle/index.js';

async function createStorage(config: Config, logger: Logger): Promise<IStorage> {
  if (config.database.url) {
    logger.info('Using PostgreSQL storage');
    const db = initializeDatabase({ url: config.database.url });
    await migrateDatabase();
    return createDrizzleStorage(db);
  }

  if (config.database.embeddedDir) {
    logger.info({ dataDir: config.database.embeddedDir }, 'Using embedded PGlite storage');
    const db = initializeDatabase({ embedded: true, dataDir: config.database.embeddedDir });
    await migrateDatabase();
    return createDrizzleStorage(db);
  }

  logger.warn('Using in-memory storage (no DATABASE_URL or EMBEDDED_DB_DIR configured); data is lost on restart');
  return createMemoryStorage();
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level });

  const storage = await createStorage(config, logger);

  const server = createSessionServer({
    storage,
    signingKey: config.secrets.signingKey,
    previousSigningKeys: config.secrets.previousSigningKeys,
    algorithm: config.session.algorithm,
    hasher: new Argon2CredentialHasher(config.hasher),
    session: config.session,
    allowedOrigins: config.origins.allowed,
    oneTimeTokenTtl: config.authorizationTokens.oneTimeTtl,
    store: config.store,
    rateLimit: config.rateLimit,
    logger,
    enableLogging: config.server.nodeEnv !== 'test',
    hsts: config.server.nodeEnv === 'production',
  });

  await server.sessions.warmUp();

  // Development convenience account
  if (config.devAccount && config.server.nodeEnv !== 'production') {
    const registered = await server.accounts.register(config.devAccount.email, config.devAccount.password);
    if (registered.ok) {
      logger.info({ subjectId: registered.value.id.toString() }, 'Created development account');
    } else if (registered.error.code !== ERROR_DUPLICATE_ID) {
      logger.warn({ code: registered.error.code }, 'Could not create development account');
    }
  }

  // Physically remove expired records; reads already treat them as absent
  const sweep = async (): Promise<void> => {
    const [sessions, tokens] = await Promise.all([
      server.sessions.sweepExpired(),
      server.authorizationTokens.sweepExpired(),
    ]);
    if (!sessions.ok || !tokens.ok) {
      logger.warn('Expired record sweep failed; retrying at the next interval');
    }
  };
  const sweepTimer =
    config.sweepIntervalMs > 0
      ? setInterval(() => {
          sweep().catch((error: unknown) => logger.error({ err: error }, 'Expired record sweep crashed'));
        }, config.sweepIntervalMs)
      : undefined;
  sweepTimer?.unref();

  const httpServer = serve(
    {
      fetch: server.app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      logger.info(
        { transmission: config.session.transmission, slidingExpiration: config.session.slidingExpiration },
        `Session service running at http://${info.address}:${info.port}`
      );
    }
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    clearInterval(sweepTimer);
    httpServer.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to close database');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  createLogger().fatal({ err: error }, 'Failed to start session service');
  process.exit(1);
});
