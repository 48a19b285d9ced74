import type { ItemParameter, ResponseObservation } from "@adaptest/lib/types";

/** Logistic scaling constant that brings the logistic curve close to the normal ogive */
export const D = 1.7;

/** Bound on D·a·(θ−b) before exp(); keeps p strictly inside (c, 1) */
export const EXPONENT_BOUND = 35;

/** Probabilities are kept this far from 0 and 1 before dividing or taking logs */
export const PROBABILITY_EPSILON = 1e-10;

function clampProbability(p: number): number {
  return Math.max(PROBABILITY_EPSILON, Math.min(1 - PROBABILITY_EPSILON, p));
}

/** ICC: c + (1-c) / (1 + exp(-D*a*(theta-b))) */
export function probabilityCorrect(parameter: ItemParameter, theta: number): number {
  const { difficulty, discrimination, guessing } = parameter;
  const z = D * discrimination * (theta - difficulty);
  const bounded = Math.max(-EXPONENT_BOUND, Math.min(EXPONENT_BOUND, z));
  return guessing + (1 - guessing) / (1 + Math.exp(-bounded));
}

/** Fisher information for the 3PL model
 * I(theta) = (D*a)^2 * (q/p) * ((p-c)/(1-c))^2
 * When c=0: reduces to (D*a)^2 * p * q
 */
export function fisherInformation(parameter: ItemParameter, theta: number): number {
  const { discrimination, guessing } = parameter;
  if (1 - guessing <= 0) return 0;
  const p = clampProbability(probabilityCorrect(parameter, theta));
  const q = 1 - p;
  const pStar = (p - guessing) / (1 - guessing);
  const scaled = D * discrimination;
  return scaled * scaled * (q / p) * pStar * pStar;
}

/** Total information for a set of items at theta */
export function totalInformation(parameters: ItemParameter[], theta: number): number {
  return parameters.reduce((sum, parameter) => sum + fisherInformation(parameter, theta), 0);
}

/** Standard error: 1 / sqrt(totalInformation), Infinity without information */
export function standardError(parameters: ItemParameter[], theta: number): number {
  const info = totalInformation(parameters, theta);
  if (info <= 0) return Number.POSITIVE_INFINITY;
  return 1 / Math.sqrt(info);
}

/** Information carried by an estimate's standard error: 1/SE², 0 when SE is 0 */
export function informationFromStandardError(se: number): number {
  if (se <= 0 || !Number.isFinite(se)) return 0;
  return 1 / (se * se);
}

/** Normalized score: 100 / (1 + exp(-1.7 * theta)) with overflow protection */
export function normalizedScore(theta: number): number {
  const exponent = -D * theta;
  if (exponent > 100) return 0;
  if (exponent < -100) return 100;
  return 100 / (1 + Math.exp(exponent));
}

/** Log-likelihood of theta given the response history */
export function logLikelihood(history: ResponseObservation[], theta: number): number {
  let ll = 0;
  for (const { parameter, isCorrect } of history) {
    const p = clampProbability(probabilityCorrect(parameter, theta));
    ll += isCorrect ? Math.log(p) : Math.log(1 - p);
  }
  return ll;
}

/** First and second derivative of the log-likelihood at theta.
 * gradient = Σ D·a·(u−p)(p−c) / (p(1−c))
 * hessian  = Σ D²a²(p−c)·q·(u·c − p²) / (p²(1−c)²)
 * `information` is Σ I(theta), the negated expected hessian.
 */
export function logLikelihoodDerivatives(
  history: ResponseObservation[],
  theta: number,
): { gradient: number; hessian: number; information: number } {
  let gradient = 0;
  let hessian = 0;
  let information = 0;

  for (const { parameter, isCorrect } of history) {
    const { discrimination, guessing } = parameter;
    const oneMinusC = 1 - guessing;
    if (oneMinusC <= 0) continue;

    const p = clampProbability(probabilityCorrect(parameter, theta));
    const q = 1 - p;
    const u = isCorrect ? 1 : 0;
    const scaled = D * discrimination;

    gradient += (scaled * (u - p) * (p - guessing)) / (p * oneMinusC);
    hessian +=
      (scaled * scaled * (p - guessing) * q * (u * guessing - p * p)) /
      (p * p * oneMinusC * oneMinusC);
    information += fisherInformation(parameter, theta);
  }

  return { gradient, hessian, information };
}
