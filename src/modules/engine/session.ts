import { randomUUID } from "node:crypto";
import { ERROR_CODES, createModuleError } from "@adaptest/core/errors";
import { SNAPSHOT_VERSION, type SessionSnapshot } from "@adaptest/lib/schema";
import type {
  AbilityEstimate,
  CompletionReason,
  EstimatorOptions,
  ItemResponse,
  ItemTemplate,
  LearnerProfile,
  PriorSettings,
  ResponseInput,
  ResponseOutcome,
  SessionOptions,
  SessionProgress,
  SessionState,
  SessionStatus,
  TerminationCriteria,
  TerminationOptions,
} from "@adaptest/lib/types";
import { DEFAULT_ESTIMATOR_OPTIONS, estimateAbility } from "./irt/estimation";
import { selectNextItem } from "./irt/selection";
import {
  DEFAULT_TERMINATION_OPTIONS,
  checkTermination,
  getDefaultCriteria,
} from "./irt/termination";

export const DEFAULT_PRIOR: PriorSettings = { theta: -1.5, standardError: 1.0 };

/** Successive estimates closer than this count as a stall */
export const DEFAULT_STALL_EPSILON = 0.02;

export interface SessionOptionsInput {
  prior?: Partial<PriorSettings>;
  estimator?: Partial<EstimatorOptions>;
  termination?: Partial<TerminationOptions>;
  stallEpsilon?: number;
}

export interface SessionInit {
  id?: string;
  learner: LearnerProfile;
  itemPool: readonly ItemTemplate[];
  criteria?: TerminationCriteria;
  options?: SessionOptionsInput;
  clock?: () => Date;
}

export function resolveSessionOptions(input?: SessionOptionsInput): SessionOptions {
  return {
    prior: { ...DEFAULT_PRIOR, ...input?.prior },
    estimator: { ...DEFAULT_ESTIMATOR_OPTIONS, ...input?.estimator },
    termination: { ...DEFAULT_TERMINATION_OPTIONS, ...input?.termination },
    stallEpsilon: input?.stallEpsilon ?? DEFAULT_STALL_EPSILON,
  };
}

function sameEstimate(a: AbilityEstimate, b: AbilityEstimate): boolean {
  return (
    a.theta === b.theta &&
    a.standardError === b.standardError &&
    a.method === b.method &&
    a.timestamp === b.timestamp
  );
}

/** Returns a description of the first broken invariant, or null */
export function findInvariantViolation(
  progress: SessionProgress,
  poolIds: ReadonlySet<string>,
): string | null {
  const { administeredItemIds, responses, abilityHistory, stallCount } = progress;

  if (responses.length !== administeredItemIds.length) {
    return `${responses.length} responses for ${administeredItemIds.length} administered items`;
  }
  if (abilityHistory.length !== responses.length + 1) {
    return `ability history has ${abilityHistory.length} entries, expected ${responses.length + 1}`;
  }
  if (abilityHistory[0].method !== "Prior") {
    return "ability history must start with the prior estimate";
  }
  if (!Number.isInteger(stallCount) || stallCount < 0) {
    return `invalid stall count ${stallCount}`;
  }

  const seen = new Set<string>();
  for (let i = 0; i < administeredItemIds.length; i++) {
    const id = administeredItemIds[i];
    if (seen.has(id)) return `item ${id} administered twice`;
    if (!poolIds.has(id)) return `item ${id} is not in the item pool`;
    seen.add(id);

    const response = responses[i];
    if (response.itemId !== id) {
      return `response ${i} is for ${response.itemId}, expected ${id}`;
    }
    if (!sameEstimate(response.abilityAfter, abilityHistory[i + 1])) {
      return `response ${i} does not match ability history entry ${i + 1}`;
    }
  }

  return null;
}

/** Adaptive test session: not_started -> in_progress -> completed.
 * Mutations build the next state, re-check invariants, then commit,
 * so a rejected call leaves the session untouched.
 */
export class AdaptiveSession {
  readonly id: string;
  readonly learner: LearnerProfile;
  readonly criteria: TerminationCriteria;
  readonly options: SessionOptions;
  private readonly pool: readonly ItemTemplate[];
  private readonly poolById: ReadonlyMap<string, ItemTemplate>;
  private readonly clock: () => Date;
  private state: SessionState;

  constructor(init: SessionInit, restored?: SessionState) {
    this.id = init.id ?? randomUUID();
    this.learner = init.learner;
    this.criteria = { ...(init.criteria ?? getDefaultCriteria()) };
    this.options = resolveSessionOptions(init.options);
    this.pool = [...init.itemPool];
    this.clock = init.clock ?? (() => new Date());

    const byId = new Map<string, ItemTemplate>();
    for (const item of this.pool) {
      if (byId.has(item.id)) {
        throw createModuleError(
          "session",
          ERROR_CODES.UNKNOWN_OR_DUPLICATE_ITEM,
          `Item pool contains duplicate id "${item.id}"`,
        );
      }
      byId.set(item.id, item);
    }
    this.poolById = byId;

    if (restored && restored.status !== "not_started") {
      const violation = findInvariantViolation(restored.progress, new Set(byId.keys()));
      if (violation) {
        throw createModuleError(
          "session",
          ERROR_CODES.SNAPSHOT_INVALID,
          `Cannot restore session ${this.id}: ${violation}`,
        );
      }
    }
    this.state = restored ?? { status: "not_started" };
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get isComplete(): boolean {
    return this.state.status === "completed";
  }

  get completionReason(): CompletionReason | null {
    return this.state.status === "completed" ? this.state.reason : null;
  }

  get startedAt(): string | null {
    return this.state.status === "not_started" ? null : this.state.startedAt;
  }

  get completedAt(): string | null {
    return this.state.status === "completed" ? this.state.completedAt : null;
  }

  get itemPool(): readonly ItemTemplate[] {
    return this.pool;
  }

  get administeredItemIds(): readonly string[] {
    return this.state.status === "not_started" ? [] : this.state.progress.administeredItemIds;
  }

  get responses(): readonly ItemResponse[] {
    return this.state.status === "not_started" ? [] : this.state.progress.responses;
  }

  get abilityHistory(): readonly AbilityEstimate[] {
    return this.state.status === "not_started" ? [] : this.state.progress.abilityHistory;
  }

  get stallCount(): number {
    return this.state.status === "not_started" ? 0 : this.state.progress.stallCount;
  }

  /** Latest ability estimate; null before start */
  get currentAbility(): AbilityEstimate | null {
    const history = this.abilityHistory;
    return history.length > 0 ? history[history.length - 1] : null;
  }

  get remainingItemCount(): number {
    return this.pool.length - this.administeredItemIds.length;
  }

  getItem(itemId: string): ItemTemplate | undefined {
    return this.poolById.get(itemId);
  }

  start(): void {
    if (this.state.status !== "not_started") {
      throw this.invalidState("start");
    }
    if (this.pool.length === 0) {
      throw createModuleError(
        "session",
        ERROR_CODES.ITEM_POOL_EMPTY,
        "No items available for the selected topic",
        { recoverable: true, fallback: "Choose a different topic" },
      );
    }

    const now = this.clock().toISOString();
    const prior: AbilityEstimate = {
      theta: this.options.prior.theta,
      standardError: this.options.prior.standardError,
      method: "Prior",
      timestamp: now,
    };
    this.state = {
      status: "in_progress",
      startedAt: now,
      progress: { administeredItemIds: [], responses: [], abilityHistory: [prior], stallCount: 0 },
    };
  }

  /** Peek at the most informative remaining item. Completes the session
   * (pool-exhausted) and returns null when nothing is left.
   */
  advanceToNextItem(): ItemTemplate | null {
    const progress = this.requireInProgress("advanceToNextItem");
    const next = this.offeredItem(progress);
    if (!next) {
      this.complete(progress, "pool-exhausted");
      return null;
    }
    return next;
  }

  recordResponse(input: ResponseInput): ResponseOutcome {
    const progress = this.requireInProgress("recordResponse");

    if (!this.poolById.has(input.itemId)) {
      throw createModuleError(
        "session",
        ERROR_CODES.UNKNOWN_OR_DUPLICATE_ITEM,
        `Item ${input.itemId} is not part of session ${this.id}`,
      );
    }
    if (progress.administeredItemIds.includes(input.itemId)) {
      throw createModuleError(
        "session",
        ERROR_CODES.UNKNOWN_OR_DUPLICATE_ITEM,
        `Item ${input.itemId} was already administered in session ${this.id}`,
      );
    }
    const offered = this.offeredItem(progress);
    if (offered?.id !== input.itemId) {
      throw createModuleError(
        "session",
        ERROR_CODES.UNKNOWN_OR_DUPLICATE_ITEM,
        `Item ${input.itemId} was not offered in session ${this.id} (current item: ${offered?.id ?? "none"})`,
      );
    }

    const score = input.score ?? (input.isCorrect ? 1 : 0);
    if (!(score >= 0 && score <= 1)) {
      throw createModuleError(
        "session",
        ERROR_CODES.INVALID_RESPONSE,
        `Score must be within [0, 1], got ${score}`,
      );
    }
    if (!Number.isFinite(input.responseTimeMs) || input.responseTimeMs < 0) {
      throw createModuleError(
        "session",
        ERROR_CODES.INVALID_RESPONSE,
        `Response time must be a non-negative number, got ${input.responseTimeMs}`,
      );
    }

    const administeredItemIds = [...progress.administeredItemIds, input.itemId];
    const history = administeredItemIds.map((id, i) => ({
      parameter: this.itemOrThrow(id).parameter,
      isCorrect: i < progress.responses.length ? progress.responses[i].isCorrect : input.isCorrect,
    }));

    const prior = progress.abilityHistory[0];
    const previous = progress.abilityHistory[progress.abilityHistory.length - 1];
    const estimation = estimateAbility(
      history,
      prior,
      this.options.estimator,
      this.clock().toISOString(),
    );
    const ability = estimation.estimate;

    const moved = Math.abs(ability.theta - previous.theta);
    const stallCount = moved < this.options.stallEpsilon ? progress.stallCount + 1 : 0;

    const response: ItemResponse = {
      itemId: input.itemId,
      isCorrect: input.isCorrect,
      score,
      responseTimeMs: input.responseTimeMs,
      rawResponse: input.rawResponse,
      abilityAfter: ability,
    };

    const next: SessionProgress = {
      administeredItemIds,
      responses: [...progress.responses, response],
      abilityHistory: [...progress.abilityHistory, ability],
      stallCount,
    };

    const violation = findInvariantViolation(next, new Set(this.poolById.keys()));
    if (violation) {
      throw createModuleError(
        "session",
        ERROR_CODES.INVALID_SESSION_STATE,
        `Response rejected for session ${this.id}: ${violation}`,
      );
    }

    const termination = checkTermination(
      ability,
      administeredItemIds.length,
      stallCount,
      this.criteria,
      this.options.termination,
    );

    if (termination.stop && termination.reason) {
      this.complete(next, termination.reason);
    } else if (administeredItemIds.length === this.pool.length) {
      this.complete(next, "pool-exhausted");
    } else if (this.state.status === "in_progress") {
      this.state = { ...this.state, progress: next };
    }

    return { response, estimation, termination, status: this.state.status };
  }

  toSnapshot(): SessionSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      id: this.id,
      learner: { ...this.learner, objectives: [...this.learner.objectives] },
      criteria: { ...this.criteria },
      options: {
        prior: { ...this.options.prior },
        estimator: { ...this.options.estimator },
        termination: { ...this.options.termination },
        stallEpsilon: this.options.stallEpsilon,
      },
      itemPoolIds: this.pool.map((item) => item.id),
      status: this.state.status,
      completionReason: this.completionReason,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      administeredItemIds: [...this.administeredItemIds],
      responses: this.responses.map((r) => ({ ...r, abilityAfter: { ...r.abilityAfter } })),
      abilityHistory: this.abilityHistory.map((a) => ({ ...a })),
      stallCount: this.stallCount,
      isComplete: this.isComplete,
    };
  }

  private complete(progress: SessionProgress, reason: CompletionReason): void {
    if (this.state.status !== "in_progress") {
      throw this.invalidState("complete");
    }
    this.state = {
      status: "completed",
      startedAt: this.state.startedAt,
      completedAt: this.clock().toISOString(),
      reason,
      progress,
    };
  }

  /** The item advanceToNextItem returns for this progress; selection is deterministic */
  private offeredItem(progress: SessionProgress): ItemTemplate | null {
    const theta = progress.abilityHistory[progress.abilityHistory.length - 1].theta;
    return selectNextItem(this.pool, new Set(progress.administeredItemIds), theta);
  }

  private requireInProgress(operation: string): SessionProgress {
    if (this.state.status !== "in_progress") {
      throw this.invalidState(operation);
    }
    return this.state.progress;
  }

  private itemOrThrow(itemId: string): ItemTemplate {
    const item = this.poolById.get(itemId);
    if (!item) {
      throw createModuleError(
        "session",
        ERROR_CODES.UNKNOWN_OR_DUPLICATE_ITEM,
        `Item ${itemId} is not part of session ${this.id}`,
      );
    }
    return item;
  }

  private invalidState(operation: string) {
    return createModuleError(
      "session",
      ERROR_CODES.INVALID_SESSION_STATE,
      `Cannot ${operation} while session ${this.id} is ${this.state.status}`,
    );
  }
}

/** Create a session and start it: the Start(learner, itemPool, criteria?) entry point */
export function startSession(init: SessionInit): AdaptiveSession {
  const session = new AdaptiveSession(init);
  session.start();
  return session;
}
