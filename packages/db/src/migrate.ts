import type { FlowpilotDatabase } from './connection.js';
import { sql } from 'drizzle-orm';

export function migrateDatabase(db: FlowpilotDatabase): void {
  db.run(sql`CREATE TABLE IF NOT EXISTS workflow_runs (
    run_id TEXT PRIMARY KEY,
    workflow_id TEXT NOT NULL,
    workflow_version INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'running',
    current_node TEXT NOT NULL,
    step_count INTEGER NOT NULL DEFAULT 0,
    context TEXT NOT NULL,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    failure_reason TEXT,
    failure_message TEXT,
    failure_node_id TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT workflow_runs_status_ck
      CHECK (status IN ('running', 'completed', 'failed', 'cancelled')),
    CONSTRAINT workflow_runs_completion_timestamp_ck
      CHECK (
        (status = 'running' AND completed_at IS NULL)
        OR
        (status IN ('completed', 'failed', 'cancelled') AND completed_at IS NOT NULL)
      ),
    CONSTRAINT workflow_runs_failure_ck
      CHECK ((failure_reason IS NULL) = (failure_message IS NULL)),
    CONSTRAINT workflow_runs_step_count_ck
      CHECK (step_count >= 0)
  )`);
  db.run(sql`CREATE INDEX IF NOT EXISTS workflow_runs_workflow_id_idx
    ON workflow_runs(workflow_id)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS workflow_runs_started_at_idx
    ON workflow_runs(started_at)`);

  db.run(sql`CREATE TABLE IF NOT EXISTS run_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL REFERENCES workflow_runs(run_id) ON DELETE CASCADE,
    sequence INTEGER NOT NULL,
    node_id TEXT NOT NULL,
    attempt INTEGER NOT NULL,
    input_snapshot TEXT NOT NULL,
    output TEXT,
    started_at TEXT NOT NULL,
    duration_ms INTEGER NOT NULL,
    error_kind TEXT,
    error_message TEXT,
    error_code TEXT,
    CONSTRAINT run_steps_sequence_ck
      CHECK (sequence >= 1),
    CONSTRAINT run_steps_attempt_ck
      CHECK (attempt >= 1),
    CONSTRAINT run_steps_error_kind_ck
      CHECK (error_kind IS NULL OR error_kind IN ('RenderError', 'HandlerError', 'UnknownHandler', 'Timeout', 'Cancelled')),
    CONSTRAINT run_steps_outcome_ck
      CHECK ((output IS NULL) OR (error_kind IS NULL))
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS run_steps_run_id_sequence_uq
    ON run_steps(run_id, sequence)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS run_steps_node_id_idx
    ON run_steps(node_id)`);
}
