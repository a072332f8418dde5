import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and
 * table bootstrap) and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    // Filter lists are read at startup and on reload only
    max: 2,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];

/**
 * Create the filter tables if they don't exist yet.
 *
 * In production this would be handled by drizzle-kit migrate,
 * but for local dev this guarantees tables are present on first run.
 */
export async function ensureTables(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS filter_lists (
      id          SERIAL PRIMARY KEY,
      name        VARCHAR(64)  NOT NULL,
      defaults    JSONB        NOT NULL DEFAULT '{}',
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS filters (
      id              SERIAL PRIMARY KEY,
      filter_list_id  INTEGER       NOT NULL REFERENCES filter_lists (id) ON DELETE CASCADE,
      content         VARCHAR(1024) NOT NULL,
      description     VARCHAR(1024),
      actions         JSONB,
      created_at      TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_filter_lists_name ON filter_lists (name)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_filters_filter_list_id ON filters (filter_list_id)`);
}
