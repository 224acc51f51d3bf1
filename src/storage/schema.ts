/**
 * SQLite Schema Definition
 *
 * One row per finished call. `event_id` is unique so a batch replayed after
 * a partial failure cannot double-count.
 *
 * @packageDocumentation
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS audit_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  event_id TEXT NOT NULL UNIQUE,
  timestamp INTEGER NOT NULL,
  requested_model TEXT NOT NULL,
  model TEXT NOT NULL,
  provider_id TEXT NOT NULL,
  tier TEXT NOT NULL,
  input_tokens INTEGER NOT NULL,
  output_tokens INTEGER NOT NULL,
  cost_usd REAL,
  would_be_cost_usd REAL,
  savings_usd REAL NOT NULL DEFAULT 0,
  latency_ms INTEGER NOT NULL,
  cache_hit INTEGER NOT NULL,
  success INTEGER NOT NULL,
  streamed INTEGER NOT NULL DEFAULT 0,
  error_code TEXT,
  source TEXT,
  agent_type TEXT,
  written_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_records(timestamp);

CREATE INDEX IF NOT EXISTS idx_audit_tier_timestamp ON audit_records(tier, timestamp);
`;
