// === adaptest Core Types ===
// ALL inter-module interfaces are defined here.

// === ENUMS ===
export type ItemFormat = "multiple-choice" | "true-false" | "short-answer";

export type EstimationMethod = "Prior" | "MLE" | "Bayes-Modal";

export type SessionStatus = "not_started" | "in_progress" | "completed";

export type TerminationReason = "max-items" | "target-se" | "mastery" | "stalled";

export type CompletionReason = TerminationReason | "pool-exhausted";

export type ReportGrouping = "topic" | "item";

// === MODULE ERROR (unified pattern) ===
export interface ModuleError {
  module: string;
  severity: "warning" | "error" | "fatal";
  code: string;
  message: string;
  recoverable: boolean;
  fallback?: string;
}

// === ITEM BANK ===
export interface ItemParameter {
  difficulty: number; // b
  discrimination: number; // a, > 0
  guessing: number; // c, in [0, 1)
}

export interface ItemChoice {
  id: string;
  text: string;
  isCorrect: boolean;
}

export interface ItemMetadata {
  topic: string;
  subtopic: string;
  explanation: string;
  objective: string;
}

export interface ItemTemplate {
  id: string;
  stem: string;
  format: ItemFormat;
  choices: ItemChoice[];
  parameter: ItemParameter;
  metadata: ItemMetadata;
}

export interface LearnerProfile {
  id: string;
  name: string;
  objectives: string[];
}

// === IRT TYPES ===
export interface AbilityEstimate {
  theta: number;
  standardError: number;
  method: EstimationMethod;
  timestamp: string; // ISO-8601
}

/** One scored observation fed to the estimator */
export interface ResponseObservation {
  parameter: ItemParameter;
  isCorrect: boolean;
}

export interface EstimatorOptions {
  maxIterations: number; // default 25
  tolerance: number; // default 1e-4
  thetaMin: number; // default -4
  thetaMax: number; // default 4
  maxStepHalvings: number; // default 10
}

export type FallbackReason = "empty-history" | "degenerate-pattern" | "no-convergence";

export type EstimationResult =
  | { kind: "converged"; estimate: AbilityEstimate; iterations: number }
  | {
      kind: "fallback";
      estimate: AbilityEstimate;
      iterations: number;
      reason: FallbackReason;
    };

export interface TerminationCriteria {
  targetStandardError: number;
  maxItems: number;
  masteryTheta: number | null;
  maxStallCount: number;
}

export interface TerminationOptions {
  masteryMinItems: number; // default 5
}

export interface TerminationDecision {
  stop: boolean;
  reason?: TerminationReason;
}

// === SESSION ===
export interface ItemResponse {
  itemId: string;
  isCorrect: boolean;
  score: number; // [0, 1]
  responseTimeMs: number;
  rawResponse: string;
  abilityAfter: AbilityEstimate;
}

export interface ResponseInput {
  itemId: string;
  isCorrect: boolean;
  score?: number;
  responseTimeMs: number;
  rawResponse: string;
}

export interface PriorSettings {
  theta: number; // default -1.5
  standardError: number; // default 1.0
}

export interface SessionOptions {
  prior: PriorSettings;
  estimator: EstimatorOptions;
  termination: TerminationOptions;
  stallEpsilon: number; // default 0.02
}

export interface SessionProgress {
  administeredItemIds: readonly string[];
  responses: readonly ItemResponse[];
  abilityHistory: readonly AbilityEstimate[];
  stallCount: number;
}

export type SessionState =
  | { status: "not_started" }
  | { status: "in_progress"; startedAt: string; progress: SessionProgress }
  | {
      status: "completed";
      startedAt: string;
      completedAt: string;
      reason: CompletionReason;
      progress: SessionProgress;
    };

export interface ResponseOutcome {
  response: ItemResponse;
  estimation: EstimationResult;
  termination: TerminationDecision;
  status: SessionStatus;
}

// === REPORT ===
export interface SessionReport {
  sessionId: string;
  learnerName: string;
  finalAbility: number;
  standardError: number;
  correctCount: number;
  totalCount: number;
  isComplete: boolean;
  completionReason: CompletionReason | null;
  topicPerformance: Record<string, number>;
  accuracyPercent: number;
  normalizedScore: number;
  ciLower: number;
  ciUpper: number;
  abilityTrajectory: number[];
}

// === EXIT CODES ===
export const EXIT_CODES = { OK: 0, FAIL: 1, ERROR: 2 } as const;
