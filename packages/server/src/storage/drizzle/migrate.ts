import { fileURLToPath } from 'node:url';

/**
 * drizzle-kit output folder (`npm run db:generate` in packages/server),
 * applied with drizzle-orm's migrator and journaled in
 * `drizzle.__drizzle_migrations`
 */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('./migrations', import.meta.url));
