import type { ItemParameter } from "@adaptest/lib/types";
import {
  fisherInformation,
  informationFromStandardError,
  logLikelihood,
  logLikelihoodDerivatives,
  normalizedScore,
  probabilityCorrect,
  standardError,
  totalInformation,
} from "@adaptest/modules/engine/irt/model";
import { describe, expect, test } from "vitest";

function param(difficulty: number, discrimination = 1.0, guessing = 0.2): ItemParameter {
  return { difficulty, discrimination, guessing };
}

describe("probabilityCorrect", () => {
  test("at theta = b it is halfway between c and 1", () => {
    expect(probabilityCorrect(param(0), 0)).toBeCloseTo(0.6, 10);
    expect(probabilityCorrect(param(1.5, 2, 0), 1.5)).toBeCloseTo(0.5, 10);
  });

  test("stays within [c, 1] for extreme abilities", () => {
    for (const theta of [-1000, -50, -4, 0, 4, 50, 1000]) {
      const p = probabilityCorrect(param(0.3, 2.5, 0.25), theta);
      expect(p).toBeGreaterThanOrEqual(0.25);
      expect(p).toBeLessThanOrEqual(1);
      expect(Number.isFinite(p)).toBe(true);
    }
  });

  test("increases with ability", () => {
    const item = param(0.5, 1.3, 0.1);
    let previous = probabilityCorrect(item, -3);
    for (let theta = -2.5; theta <= 3; theta += 0.5) {
      const p = probabilityCorrect(item, theta);
      expect(p).toBeGreaterThan(previous);
      previous = p;
    }
  });
});

describe("fisherInformation", () => {
  test("reduces to (D*a)^2 * p * q when c = 0", () => {
    // p = q = 0.5 at theta = b
    expect(fisherInformation(param(0, 1, 0), 0)).toBeCloseTo(2.89 * 0.25, 10);
  });

  test("3PL value at theta = b", () => {
    // p = 0.6, q = 0.4, p* = 0.5
    expect(fisherInformation(param(0), 0)).toBeCloseTo(2.89 * (0.4 / 0.6) * 0.25, 10);
  });

  test("is non-negative and finite everywhere", () => {
    for (const theta of [-100, -4, -1, 0, 1, 4, 100]) {
      const info = fisherInformation(param(-0.5, 1.8, 0.3), theta);
      expect(info).toBeGreaterThanOrEqual(0);
      expect(Number.isFinite(info)).toBe(true);
    }
  });

  test("is zero when guessing leaves nothing to learn", () => {
    expect(fisherInformation(param(0, 1, 1), 0)).toBe(0);
  });

  test("peaks at theta = b without guessing", () => {
    const item = param(0.7, 1.4, 0);
    const atPeak = fisherInformation(item, 0.7);
    for (const offset of [-2, -1, -0.5, -0.1, 0.1, 0.5, 1, 2]) {
      expect(fisherInformation(item, 0.7 + offset)).toBeLessThan(atPeak);
    }
  });

  test("with guessing, theta = b beats abilities half a unit or more away", () => {
    const item = param(0);
    const atB = fisherInformation(item, 0);
    for (const offset of [-2, -1, -0.5, 0.5, 1, 2]) {
      expect(fisherInformation(item, offset)).toBeLessThan(atB);
    }
  });
});

describe("totalInformation / standardError", () => {
  test("total information is the sum over items", () => {
    const items = [param(-1), param(0), param(1)];
    const expected = items.reduce((s, p) => s + fisherInformation(p, 0.2), 0);
    expect(totalInformation(items, 0.2)).toBeCloseTo(expected, 12);
  });

  test("standard error is 1/sqrt(info), Infinity without items", () => {
    const items = [param(0, 1, 0), param(0, 1, 0), param(0, 1, 0), param(0, 1, 0)];
    // 4 * 0.7225 = 2.89 -> 1/1.7
    expect(standardError(items, 0)).toBeCloseTo(1 / 1.7, 10);
    expect(standardError([], 0)).toBe(Number.POSITIVE_INFINITY);
  });

  test("informationFromStandardError inverts the square", () => {
    expect(informationFromStandardError(0.5)).toBe(4);
    expect(informationFromStandardError(0)).toBe(0);
    expect(informationFromStandardError(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("normalizedScore", () => {
  test("maps theta onto 0-100 with 50 at zero", () => {
    expect(normalizedScore(0)).toBe(50);
    expect(normalizedScore(2)).toBeGreaterThan(90);
    expect(normalizedScore(-2)).toBeLessThan(10);
    expect(normalizedScore(1000)).toBe(100);
    expect(normalizedScore(-1000)).toBe(0);
  });
});

describe("logLikelihood derivatives", () => {
  test("gradient points towards the correct answers", () => {
    const correct = logLikelihoodDerivatives([{ parameter: param(0), isCorrect: true }], 0);
    const wrong = logLikelihoodDerivatives([{ parameter: param(0), isCorrect: false }], 0);
    expect(correct.gradient).toBeGreaterThan(0);
    expect(wrong.gradient).toBeLessThan(0);
  });

  test("observed hessian equals negative information when c = 0", () => {
    const history = [
      { parameter: param(-1, 1.2, 0), isCorrect: true },
      { parameter: param(0.5, 0.8, 0), isCorrect: false },
      { parameter: param(1, 1.5, 0), isCorrect: true },
    ];
    const { hessian, information } = logLikelihoodDerivatives(history, 0.3);
    expect(hessian).toBeCloseTo(-information, 10);
  });

  test("gradient matches a finite difference of the log-likelihood", () => {
    const history = [
      { parameter: param(-0.5, 1.1, 0.2), isCorrect: true },
      { parameter: param(0.4, 1.6, 0.15), isCorrect: false },
      { parameter: param(1.2, 0.9, 0.25), isCorrect: true },
    ];
    const h = 1e-5;
    const numeric = (logLikelihood(history, 0.1 + h) - logLikelihood(history, 0.1 - h)) / (2 * h);
    expect(logLikelihoodDerivatives(history, 0.1).gradient).toBeCloseTo(numeric, 5);
  });
});
