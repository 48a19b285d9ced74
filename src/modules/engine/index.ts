export {
  AdaptiveSession,
  DEFAULT_PRIOR,
  DEFAULT_STALL_EPSILON,
  findInvariantViolation,
  resolveSessionOptions,
  startSession,
} from "./session";
export type { SessionInit, SessionOptionsInput } from "./session";
export {
  deserializeSession,
  parseSnapshot,
  restoreSession,
  serializeSession,
  toSnapshot,
} from "./snapshot";
export { accuracyPercent, buildSessionReport } from "./report";
export type { ReportOptions } from "./report";

// Re-export sub-modules
export {
  probabilityCorrect,
  fisherInformation,
  informationFromStandardError,
  normalizedScore,
  standardError,
  logLikelihood,
  logLikelihoodDerivatives,
  totalInformation,
} from "./irt/model";
export {
  DEFAULT_ESTIMATOR_OPTIONS,
  clampTheta,
  estimateAbility,
  estimateAbilityBayesModal,
} from "./irt/estimation";
export { selectNextItem, rankItemsByInformation, filterItemsByTopic } from "./irt/selection";
export {
  DEFAULT_TERMINATION_OPTIONS,
  checkTermination,
  getDefaultCriteria,
  shouldStop,
} from "./irt/termination";
