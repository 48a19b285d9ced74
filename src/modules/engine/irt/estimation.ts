import type {
  AbilityEstimate,
  EstimationResult,
  EstimatorOptions,
  FallbackReason,
  ResponseObservation,
} from "@adaptest/lib/types";
import { logLikelihood, logLikelihoodDerivatives, totalInformation } from "./model";

export const DEFAULT_ESTIMATOR_OPTIONS: EstimatorOptions = {
  maxIterations: 25,
  tolerance: 1e-4,
  thetaMin: -4,
  thetaMax: 4,
  maxStepHalvings: 10,
};

/** Curvature magnitudes below this are treated as flat */
const FLAT_CURVATURE = 1e-12;

interface NormalPrior {
  mean: number;
  variance: number;
}

interface MaximizationResult {
  theta: number;
  iterations: number;
  converged: boolean;
}

export function clampTheta(theta: number, opts: EstimatorOptions): number {
  return Math.max(opts.thetaMin, Math.min(opts.thetaMax, theta));
}

function objective(history: ResponseObservation[], theta: number, prior?: NormalPrior): number {
  const ll = logLikelihood(history, theta);
  if (!prior) return ll;
  const d = theta - prior.mean;
  return ll - (d * d) / (2 * prior.variance);
}

/** Newton-Raphson with step-halving on the log-likelihood, or on the
 * log-posterior when a normal prior is given (Bayes modal).
 * Uses the observed hessian while it is negative, the expected one otherwise.
 */
function maximize(
  history: ResponseObservation[],
  start: number,
  opts: EstimatorOptions,
  prior?: NormalPrior,
): MaximizationResult {
  let theta = clampTheta(start, opts);

  for (let iter = 0; iter < opts.maxIterations; iter++) {
    const { gradient, hessian, information } = logLikelihoodDerivatives(history, theta);
    const precision = prior ? 1 / prior.variance : 0;
    const priorGradient = prior ? -(theta - prior.mean) * precision : 0;

    const observed = hessian - precision;
    const curvature = observed < -FLAT_CURVATURE ? observed : -(information + precision);
    if (curvature > -FLAT_CURVATURE) {
      return { theta, iterations: iter, converged: false };
    }

    const step = -(gradient + priorGradient) / curvature;
    if (!Number.isFinite(step)) {
      return { theta, iterations: iter, converged: false };
    }

    const current = objective(history, theta, prior);
    let scale = 1;
    let next = clampTheta(theta + step, opts);
    for (let h = 0; h < opts.maxStepHalvings; h++) {
      if (objective(history, next, prior) >= current - FLAT_CURVATURE) break;
      scale *= 0.5;
      next = clampTheta(theta + scale * step, opts);
    }

    const delta = next - theta;
    theta = next;
    if (Math.abs(delta) < opts.tolerance) {
      // Held at a bound while the step still points past it: the maximum lies outside the range
      const pinned =
        Math.abs(step) >= opts.tolerance &&
        ((theta <= opts.thetaMin && step < 0) || (theta >= opts.thetaMax && step > 0));
      return { theta, iterations: iter + 1, converged: !pinned };
    }
  }

  return { theta, iterations: opts.maxIterations, converged: false };
}

function isDegenerate(history: ResponseObservation[]): boolean {
  return history.every((r) => r.isCorrect === history[0].isCorrect);
}

/** SE from the inverse of total information; the prior SE when there is none */
function finalStandardError(
  history: ResponseObservation[],
  theta: number,
  prior: AbilityEstimate,
): number {
  const info = totalInformation(
    history.map((r) => r.parameter),
    theta,
  );
  if (!(info > 0) || !Number.isFinite(info)) return prior.standardError;
  return 1 / Math.sqrt(info);
}

function bayesModal(
  history: ResponseObservation[],
  prior: AbilityEstimate,
  opts: EstimatorOptions,
): MaximizationResult {
  const sd = prior.standardError > 0 ? prior.standardError : 1;
  const result = maximize(history, prior.theta, opts, { mean: prior.theta, variance: sd * sd });
  if (Number.isFinite(result.theta)) return result;
  return { ...result, theta: clampTheta(prior.theta, opts), converged: false };
}

/** Bayes modal estimate with N(prior.theta, prior.SE²) as regularizer */
export function estimateAbilityBayesModal(
  history: ResponseObservation[],
  prior: AbilityEstimate,
  options?: Partial<EstimatorOptions>,
  timestamp: string = new Date().toISOString(),
): AbilityEstimate {
  const opts = { ...DEFAULT_ESTIMATOR_OPTIONS, ...options };
  const { theta } = bayesModal(history, prior, opts);
  return {
    theta,
    standardError: finalStandardError(history, theta, prior),
    method: "Bayes-Modal",
    timestamp,
  };
}

/** Facade:
 * 1. no responses -> prior unchanged
 * 2. all responses identical -> Bayes modal (likelihood has no interior maximum)
 * 3. otherwise -> MLE, Bayes modal if MLE does not converge
 */
export function estimateAbility(
  history: ResponseObservation[],
  prior: AbilityEstimate,
  options?: Partial<EstimatorOptions>,
  timestamp: string = new Date().toISOString(),
): EstimationResult {
  const opts = { ...DEFAULT_ESTIMATOR_OPTIONS, ...options };

  if (history.length === 0) {
    return {
      kind: "fallback",
      reason: "empty-history",
      iterations: 0,
      estimate: { ...prior, theta: clampTheta(prior.theta, opts) },
    };
  }

  const fallback = (reason: FallbackReason, spent: number): EstimationResult => {
    const map = bayesModal(history, prior, opts);
    return {
      kind: "fallback",
      reason,
      iterations: spent + map.iterations,
      estimate: {
        theta: map.theta,
        standardError: finalStandardError(history, map.theta, prior),
        method: "Bayes-Modal",
        timestamp,
      },
    };
  };

  if (isDegenerate(history)) return fallback("degenerate-pattern", 0);

  const mle = maximize(history, prior.theta, opts);
  if (!mle.converged || !Number.isFinite(mle.theta)) {
    return fallback("no-convergence", mle.iterations);
  }

  return {
    kind: "converged",
    iterations: mle.iterations,
    estimate: {
      theta: mle.theta,
      standardError: finalStandardError(history, mle.theta, prior),
      method: "MLE",
      timestamp,
    },
  };
}
