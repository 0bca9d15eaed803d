/**
 * SQLite Schema Definition
 *
 * Defines the database schema for the usage ledger.
 *
 * @packageDocumentation
 */

/**
 * SQL statements for creating the database schema.
 */
export const SCHEMA_SQL = `
-- Usage table: one row per finished request, no conversation content
CREATE TABLE IF NOT EXISTS usage (
  id TEXT PRIMARY KEY,
  request_id TEXT NOT NULL,
  model TEXT,
  principal TEXT,
  stream INTEGER NOT NULL,
  outcome TEXT NOT NULL CHECK (outcome IN ('completed', 'failed', 'aborted')),
  status INTEGER,
  error_kind TEXT,
  tokens_prompt INTEGER NOT NULL,
  tokens_response INTEGER NOT NULL,
  latency_ms INTEGER NOT NULL,
  created_at TEXT NOT NULL
);

-- Index for time-based queries
CREATE INDEX IF NOT EXISTS idx_usage_created_at ON usage(created_at);

-- Index for model queries
CREATE INDEX IF NOT EXISTS idx_usage_model ON usage(model);

`;
