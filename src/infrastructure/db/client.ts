import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. */
  max?: number;
  /** Server-side `statement_timeout`, in milliseconds. */
  statementTimeoutMs?: number;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and
 * schema bootstrap) and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: options.statementTimeoutMs !== undefined
      ? { statement_timeout: options.statementTimeoutMs }
      : {},
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type SqlClient = ReturnType<typeof createDbClient>['sql'];
