import type { Sql } from 'postgres';
import type { Logger } from 'pino';

/**
 * Idempotent DDL for the ledger tables.
 *
 * Mirrors schema.ts. drizzle-kit can generate versioned migrations from the
 * schema; this keeps a fresh database usable with a single `migrate` run.
 */
const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS events (
    id          INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    kind        TEXT        NOT NULL,
    payload     JSONB,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp()
  )`,
  `CREATE TABLE IF NOT EXISTS updates (
    id          INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    name        TEXT        NOT NULL,
    version     TEXT,
    state       TEXT        NOT NULL CHECK (state IN ('pending', 'applied', 'failed', 'rolled_back')),
    meta        JSONB,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_events_kind ON events (kind)`,
  `CREATE INDEX IF NOT EXISTS idx_events_update_ref ON events ((payload->>'update_id'))`,
  `CREATE INDEX IF NOT EXISTS idx_updates_state ON updates (state)`,
  `CREATE INDEX IF NOT EXISTS idx_updates_name ON updates (name)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_updates_pending_versioned
    ON updates (name, version)
    WHERE state = 'pending' AND version IS NOT NULL`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_updates_pending_unversioned
    ON updates (name)
    WHERE state = 'pending' AND version IS NULL`,
];

export async function migrate(sql: Sql, log: Logger): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
  log.info({ statements: STATEMENTS.length }, 'Database ready (events + updates tables)');
}
