import { ERROR_CODES, createModuleError } from "@adaptest/core/errors";
import { type SessionSnapshot, SessionSnapshotSchema } from "@adaptest/lib/schema";
import type { ItemTemplate, SessionState } from "@adaptest/lib/types";
import { AdaptiveSession } from "./session";

function invalid(message: string) {
  return createModuleError("snapshot", ERROR_CODES.SNAPSHOT_INVALID, message);
}

/** Validate an untrusted value against the versioned snapshot schema */
export function parseSnapshot(raw: unknown): SessionSnapshot {
  const result = SessionSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw invalid(`Invalid session snapshot: ${issues}`);
  }
  return result.data;
}

function stateFromSnapshot(snapshot: SessionSnapshot): SessionState {
  if (snapshot.isComplete !== (snapshot.status === "completed")) {
    throw invalid(`isComplete=${snapshot.isComplete} contradicts status "${snapshot.status}"`);
  }

  if (snapshot.status === "not_started") {
    if (
      snapshot.administeredItemIds.length > 0 ||
      snapshot.responses.length > 0 ||
      snapshot.abilityHistory.length > 0 ||
      snapshot.stallCount !== 0 ||
      snapshot.startedAt !== null
    ) {
      throw invalid("A session that has not started cannot carry progress");
    }
    return { status: "not_started" };
  }

  if (snapshot.startedAt === null) {
    throw invalid(`A ${snapshot.status} session needs startedAt`);
  }

  const progress = {
    administeredItemIds: snapshot.administeredItemIds,
    responses: snapshot.responses,
    abilityHistory: snapshot.abilityHistory,
    stallCount: snapshot.stallCount,
  };

  if (snapshot.status === "in_progress") {
    if (snapshot.completionReason !== null || snapshot.completedAt !== null) {
      throw invalid("An in-progress session cannot carry completion data");
    }
    return { status: "in_progress", startedAt: snapshot.startedAt, progress };
  }

  if (snapshot.completionReason === null || snapshot.completedAt === null) {
    throw invalid("A completed session needs completionReason and completedAt");
  }
  return {
    status: "completed",
    startedAt: snapshot.startedAt,
    completedAt: snapshot.completedAt,
    reason: snapshot.completionReason,
    progress,
  };
}

/** Rebuild a session from its snapshot through the public constructor.
 * `items` may be the whole bank; the session keeps only the snapshot's pool.
 */
export function restoreSession(
  snapshot: SessionSnapshot,
  items: readonly ItemTemplate[],
  clock?: () => Date,
): AdaptiveSession {
  const byId = new Map(items.map((item) => [item.id, item]));
  const pool: ItemTemplate[] = [];
  const seen = new Set<string>();
  for (const id of snapshot.itemPoolIds) {
    if (seen.has(id)) {
      throw invalid(`Item ${id} appears twice in the pool of session ${snapshot.id}`);
    }
    seen.add(id);
    const item = byId.get(id);
    if (!item) {
      throw invalid(`Item ${id} from session ${snapshot.id} is missing from the item bank`);
    }
    pool.push(item);
  }

  return new AdaptiveSession(
    {
      id: snapshot.id,
      learner: snapshot.learner,
      itemPool: pool,
      criteria: snapshot.criteria,
      options: snapshot.options,
      clock,
    },
    stateFromSnapshot(snapshot),
  );
}

export function toSnapshot(session: AdaptiveSession): SessionSnapshot {
  return session.toSnapshot();
}

export function serializeSession(session: AdaptiveSession): string {
  return JSON.stringify(toSnapshot(session));
}

export function deserializeSession(
  json: string,
  items: readonly ItemTemplate[],
  clock?: () => Date,
): AdaptiveSession {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw invalid(
      `Session snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return restoreSession(parseSnapshot(raw), items, clock);
}
