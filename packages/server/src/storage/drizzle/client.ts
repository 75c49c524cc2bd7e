import { PGlite } from '@electric-sql/pglite';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle as drizzlePglite } from 'drizzle-orm/pglite';
import { migrate as migratePglite } from 'drizzle-orm/pglite/migrator';
import { drizzle as drizzlePostgres } from 'drizzle-orm/postgres-js';
import { migrate as migratePostgres } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import { MIGRATIONS_FOLDER } from './migrate.js';
import * as schema from './schema.js';

export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export type DatabaseOptions =
  | { url: string; poolMax?: number; connectTimeoutSeconds?: number }
  | { embedded: true; dataDir?: string };

interface DatabaseHandle {
  db: Database;
  migrate: () => Promise<void>;
  close: () => Promise<void>;
}

let handle: DatabaseHandle | null = null;

function createHandle(options: DatabaseOptions): DatabaseHandle {
  // Embedded PGlite for development without a Postgres server
  if ('embedded' in options) {
    const client = new PGlite(options.dataDir);
    const db = drizzlePglite(client, { schema });
    return {
      db,
      migrate: () => migratePglite(db, { migrationsFolder: MIGRATIONS_FOLDER }),
      close: () => client.close(),
    };
  }

  const client = postgres(options.url, {
    max: options.poolMax ?? 10,
    idle_timeout: 20,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
  });
  const db = drizzlePostgres(client, { schema });
  return {
    db,
    migrate: () => migratePostgres(db, { migrationsFolder: MIGRATIONS_FOLDER }),
    close: () => client.end(),
  };
}

/**
 * Initialize the database connection
 */
export function initializeDatabase(options: DatabaseOptions): Database {
  if (!handle) {
    handle = createHandle(options);
  }
  return handle.db;
}

/**
 * Apply pending migrations to the initialized database
 */
export async function migrateDatabase(): Promise<void> {
  if (!handle) {
    throw new Error('Database not initialized: call initializeDatabase() first');
  }
  await handle.migrate();
}

/**
 * Close the database connection
 */
export async function closeDatabase(): Promise<void> {
  if (handle) {
    const { close } = handle;
    handle = null;
    await close();
  }
}
