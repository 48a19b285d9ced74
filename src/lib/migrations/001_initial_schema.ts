import type { DatabaseConnection } from "../db";

export const version = 1;
export const name = "initial_schema";

export function up(db: DatabaseConnection): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS adaptive_sessions (
      id TEXT PRIMARY KEY,
      learner_id TEXT NOT NULL,
      learner_name TEXT NOT NULL,
      topic TEXT,
      status TEXT NOT NULL, -- not_started | in_progress | completed
      completion_reason TEXT,
      n_items INTEGER NOT NULL DEFAULT 0,
      theta REAL,
      se REAL,
      snapshot TEXT NOT NULL, -- JSON, versioned
      revision INTEGER NOT NULL DEFAULT 1,
      started_at TEXT,
      completed_at TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_adaptive_sessions_learner ON adaptive_sessions(learner_id);
    CREATE INDEX IF NOT EXISTS idx_adaptive_sessions_status ON adaptive_sessions(status);
  `);
}
