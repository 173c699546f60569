import type { SqlClient } from './client.js';

/**
 * Ensures the `events` table and its index exist.
 *
 * A lightweight bootstrap for local runs; `drizzle-kit generate` produces
 * proper migrations from schema.ts for managed environments.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      id           BIGSERIAL    PRIMARY KEY,
      request_id   VARCHAR(255) NOT NULL,
      author       TEXT         NOT NULL,
      action       VARCHAR(20)  NOT NULL,
      from_branch  TEXT         NOT NULL,
      to_branch    TEXT         NOT NULL,
      timestamp    VARCHAR(20)  NOT NULL,
      received_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp)`);
}
