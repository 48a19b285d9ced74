import type { EngineSettings } from "@adaptest/lib/config";
import type { SessionRepository } from "@adaptest/lib/repositories/sessions";
import type {
  ItemTemplate,
  LearnerProfile,
  ReportGrouping,
  ResponseInput,
  ResponseOutcome,
  SessionReport,
  TerminationCriteria,
} from "@adaptest/lib/types";
import {
  type AdaptiveSession,
  buildSessionReport,
  fisherInformation,
  parseSnapshot,
  restoreSession,
  startSession,
} from "@adaptest/modules/engine/index";
import type { ItemBank } from "@adaptest/modules/item-bank/loader";
import { ERROR_CODES, createModuleError } from "./errors";
import type { EventBus } from "./event-bus";

export interface AssessmentDeps {
  bus: EventBus;
  bank: ItemBank;
  sessions: SessionRepository;
  settings: EngineSettings;
  clock?: () => Date;
}

/** A live session together with the stored revision it was last saved at */
export interface TrackedSession {
  session: AdaptiveSession;
  revision: number;
  topic: string | null;
}

export interface StartOptions {
  topic?: string;
  criteria?: Partial<TerminationCriteria>;
}

/** Runs adaptive sessions against the item bank and keeps them persisted */
export class AssessmentService {
  constructor(private deps: AssessmentDeps) {}

  private get bus() {
    return this.deps.bus;
  }

  startSession(learner: LearnerProfile, opts: StartOptions = {}): TrackedSession {
    const topic = opts.topic?.trim() || null;
    const pool = topic ? this.deps.bank.getByTopic(topic) : this.deps.bank.getAll();
    if (pool.length === 0) {
      throw createModuleError(
        "assessment",
        ERROR_CODES.ITEM_POOL_EMPTY,
        topic ? `No items available for topic "${topic}"` : "The item bank is empty",
        { recoverable: true, fallback: `Available topics: ${this.deps.bank.topics().join(", ")}` },
      );
    }

    const session = startSession({
      learner,
      itemPool: pool,
      criteria: { ...this.deps.settings.criteria, ...opts.criteria },
      options: this.deps.settings.options,
      clock: this.deps.clock,
    });

    const revision = this.deps.sessions.insert(session.toSnapshot(), topic);
    this.bus.emit("session.started", {
      session_id: session.id,
      learner_id: learner.id,
      topic,
      pool_size: pool.length,
    });
    this.bus.emit("session.saved", { session_id: session.id, revision });

    return { session, revision, topic };
  }

  resumeSession(sessionId: string): TrackedSession {
    const row = this.deps.sessions.findById(sessionId);
    if (!row) {
      throw createModuleError(
        "assessment",
        ERROR_CODES.SESSION_NOT_FOUND,
        `Session not found: ${sessionId}`,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(row.snapshot);
    } catch (err) {
      throw createModuleError(
        "assessment",
        ERROR_CODES.SNAPSHOT_INVALID,
        `Stored snapshot for ${sessionId} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const session = restoreSession(parseSnapshot(raw), this.deps.bank.getAll(), this.deps.clock);
    this.bus.emit("session.resumed", { session_id: session.id, revision: row.revision });
    return { session, revision: row.revision, topic: row.topic };
  }

  /** Next item to present, or null once the session has completed */
  nextItem(tracked: TrackedSession): ItemTemplate | null {
    const { session } = tracked;
    if (session.isComplete) return null;

    const draft = this.draftOf(session);
    const item = draft.advanceToNextItem();
    if (!item) {
      // Pool ran out: the draft completed inside advanceToNextItem
      const revision = this.commit(tracked, draft);
      this.emitCompleted(draft);
      this.bus.emit("session.saved", { session_id: draft.id, revision });
      return null;
    }

    const theta = session.currentAbility?.theta ?? session.options.prior.theta;
    this.bus.emit("session.item.selected", {
      session_id: session.id,
      item_id: item.id,
      theta,
      information: fisherInformation(item.parameter, theta),
    });
    return item;
  }

  /** Record a response and persist the result. The tracked session is only
   * replaced once the store has accepted the new revision.
   */
  submitResponse(tracked: TrackedSession, input: ResponseInput): ResponseOutcome {
    const draft = this.draftOf(tracked.session);
    const outcome = draft.recordResponse(input);
    const revision = this.commit(tracked, draft);

    const ability = outcome.response.abilityAfter;
    this.bus.emit("session.response.recorded", {
      session_id: draft.id,
      item_id: input.itemId,
      is_correct: input.isCorrect,
      theta: ability.theta,
      se: ability.standardError,
      method: ability.method,
      n_items: draft.responses.length,
    });
    if (outcome.estimation.kind === "fallback") {
      this.bus.emit("session.estimator.fallback", {
        session_id: draft.id,
        reason: outcome.estimation.reason,
        theta: ability.theta,
      });
    }
    if (draft.isComplete) {
      this.emitCompleted(draft);
    }
    this.bus.emit("session.saved", { session_id: draft.id, revision });

    return outcome;
  }

  generateReport(tracked: TrackedSession, groupBy?: ReportGrouping): SessionReport {
    const report = buildSessionReport(tracked.session, {
      groupBy: groupBy ?? this.deps.settings.groupBy,
    });
    this.bus.emit("report.generated", { report });
    return report;
  }

  private draftOf(session: AdaptiveSession): AdaptiveSession {
    return restoreSession(session.toSnapshot(), session.itemPool, this.deps.clock);
  }

  /** Store the draft, then swap it in; a failed update leaves `tracked` untouched */
  private commit(tracked: TrackedSession, draft: AdaptiveSession): number {
    const revision = this.deps.sessions.update(draft.toSnapshot(), tracked.revision);
    tracked.session = draft;
    tracked.revision = revision;
    return revision;
  }

  private emitCompleted(session: AdaptiveSession): void {
    const ability = session.currentAbility;
    const reason = session.completionReason;
    if (!ability || !reason) return;
    this.bus.emit("session.completed", {
      session_id: session.id,
      reason,
      theta: ability.theta,
      se: ability.standardError,
      n_items: session.responses.length,
    });
  }
}
