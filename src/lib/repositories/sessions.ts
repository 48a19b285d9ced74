import { ERROR_CODES, createModuleError } from "@adaptest/core/errors";
import {
  type DatabaseConnection,
  type Row,
  nullableNumberColumn,
  nullableTextColumn,
  numberColumn,
  textColumn,
} from "@adaptest/lib/db";
import type { SessionSnapshot } from "@adaptest/lib/schema";

export interface SessionRow {
  id: string;
  learner_id: string;
  learner_name: string;
  topic: string | null;
  status: string;
  completion_reason: string | null;
  n_items: number;
  theta: number | null;
  se: number | null;
  snapshot: string;
  revision: number;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

type SessionColumns = Omit<SessionRow, "topic" | "revision" | "created_at" | "updated_at">;

function toColumns(snapshot: SessionSnapshot): SessionColumns {
  const current = snapshot.abilityHistory.at(-1);
  return {
    id: snapshot.id,
    learner_id: snapshot.learner.id,
    learner_name: snapshot.learner.name,
    status: snapshot.status,
    completion_reason: snapshot.completionReason,
    n_items: snapshot.responses.length,
    theta: current?.theta ?? null,
    se: current?.standardError ?? null,
    snapshot: JSON.stringify(snapshot),
    started_at: snapshot.startedAt,
    completed_at: snapshot.completedAt,
  };
}

function toSessionRow(row: Row): SessionRow {
  return {
    id: textColumn(row, "id"),
    learner_id: textColumn(row, "learner_id"),
    learner_name: textColumn(row, "learner_name"),
    topic: nullableTextColumn(row, "topic"),
    status: textColumn(row, "status"),
    completion_reason: nullableTextColumn(row, "completion_reason"),
    n_items: numberColumn(row, "n_items"),
    theta: nullableNumberColumn(row, "theta"),
    se: nullableNumberColumn(row, "se"),
    snapshot: textColumn(row, "snapshot"),
    revision: numberColumn(row, "revision"),
    started_at: nullableTextColumn(row, "started_at"),
    completed_at: nullableTextColumn(row, "completed_at"),
    created_at: textColumn(row, "created_at"),
    updated_at: textColumn(row, "updated_at"),
  };
}

/** Persists session snapshots with an optimistic revision counter */
export class SessionRepository {
  constructor(
    private db: DatabaseConnection,
    private clock: () => Date = () => new Date(),
  ) {}

  /** Insert a new session at revision 1 */
  insert(snapshot: SessionSnapshot, topic: string | null = null): number {
    const record = toColumns(snapshot);
    const now = this.clock().toISOString();
    this.db.run(
      `INSERT INTO adaptive_sessions (id, learner_id, learner_name, topic, status, completion_reason, n_items, theta, se, snapshot, revision, started_at, completed_at, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?, ?, ?)`,
      [
        record.id,
        record.learner_id,
        record.learner_name,
        topic,
        record.status,
        record.completion_reason,
        record.n_items,
        record.theta,
        record.se,
        record.snapshot,
        record.started_at,
        record.completed_at,
        now,
        now,
      ],
    );
    return 1;
  }

  /** Overwrite a session if it is still at `expectedRevision`; returns the new revision */
  update(snapshot: SessionSnapshot, expectedRevision: number): number {
    const record = toColumns(snapshot);
    const changes = this.db.run(
      `UPDATE adaptive_sessions
       SET status = ?, completion_reason = ?, n_items = ?, theta = ?, se = ?, snapshot = ?,
           started_at = ?, completed_at = ?, revision = revision + 1, updated_at = ?
       WHERE id = ? AND revision = ?`,
      [
        record.status,
        record.completion_reason,
        record.n_items,
        record.theta,
        record.se,
        record.snapshot,
        record.started_at,
        record.completed_at,
        this.clock().toISOString(),
        record.id,
        expectedRevision,
      ],
    );

    if (changes === 0) {
      const current = this.findById(record.id);
      if (!current) {
        throw createModuleError(
          "storage",
          ERROR_CODES.SESSION_NOT_FOUND,
          `Session not found: ${record.id}`,
        );
      }
      throw createModuleError(
        "storage",
        ERROR_CODES.SESSION_CONFLICT,
        `Session ${record.id} is at revision ${current.revision}, expected ${expectedRevision}`,
        { recoverable: true, fallback: "Reload the session and retry" },
      );
    }
    return expectedRevision + 1;
  }

  findById(id: string): SessionRow | null {
    const row = this.db.get("SELECT * FROM adaptive_sessions WHERE id = ?", [id]);
    return row ? toSessionRow(row) : null;
  }

  findByLearner(learnerId: string): SessionRow[] {
    return this.db
      .all(
        "SELECT * FROM adaptive_sessions WHERE learner_id = ? ORDER BY created_at DESC, rowid DESC",
        [learnerId],
      )
      .map(toSessionRow);
  }

  /** Sessions of a learner that have not completed yet */
  findActive(learnerId: string): SessionRow[] {
    return this.db
      .all(
        "SELECT * FROM adaptive_sessions WHERE learner_id = ? AND status != 'completed' ORDER BY updated_at DESC, rowid DESC",
        [learnerId],
      )
      .map(toSessionRow);
  }

  findCompleted(learnerId: string, limit = 50): SessionRow[] {
    return this.db
      .all(
        "SELECT * FROM adaptive_sessions WHERE learner_id = ? AND status = 'completed' ORDER BY completed_at DESC, rowid DESC LIMIT ?",
        [learnerId, limit],
      )
      .map(toSessionRow);
  }

  /** Most recently touched session for a learner, if any */
  findMostRecent(learnerId: string): SessionRow | null {
    const row = this.db.get(
      "SELECT * FROM adaptive_sessions WHERE learner_id = ? ORDER BY updated_at DESC, rowid DESC LIMIT 1",
      [learnerId],
    );
    return row ? toSessionRow(row) : null;
  }

  delete(id: string): boolean {
    return this.db.run("DELETE FROM adaptive_sessions WHERE id = ?", [id]) > 0;
  }
}
