/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import { loadConfig } from '@/config';

export type Database = PostgresJsDatabase<typeof schema>;

const config = loadConfig();

if (!config.database.url) {
  throw new Error('DATABASE_URL environment variable is required');
}

// The pool connects lazily, so importing this module does not open a socket.
export const sql = postgres(config.database.url, {
  max: config.database.poolSize,
  idle_timeout: 20,
  connect_timeout: 10,
  ssl: config.env === 'production' ? 'require' : false,
});

export const db: Database = drizzle(sql, { schema });

/**
 * Close the database connection pool
 * Used during graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  await sql.end();
}
