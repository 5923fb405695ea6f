import type { SqlClient } from './client.js';

/**
 * Idempotent DDL mirroring `schema.ts`.
 *
 * drizzle-kit generates real migrations from the schema (see
 * drizzle.config.ts); this guarantees the table is present on first run
 * against an empty database.
 */
const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS events (
    id           UUID PRIMARY KEY,
    type         VARCHAR(255) NOT NULL,
    state        SMALLINT     NOT NULL DEFAULT 0,
    started_at   TIMESTAMPTZ  NOT NULL,
    finished_at  TIMESTAMPTZ,
    CONSTRAINT chk_events_finished_at CHECK ((state = 1) = (finished_at IS NOT NULL)),
    CONSTRAINT chk_events_finished_after_start CHECK (finished_at IS NULL OR finished_at >= started_at)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_events_type ON events (type)`,
  `CREATE INDEX IF NOT EXISTS idx_events_started_at ON events (started_at)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uniq_events_active_type ON events (type) WHERE state = 0`,
];

export async function ensureSchema(sql: SqlClient): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
