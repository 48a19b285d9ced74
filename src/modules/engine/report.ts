import type { ReportGrouping, SessionReport } from "@adaptest/lib/types";
import { normalizedScore } from "./irt/model";
import type { AdaptiveSession } from "./session";

export interface ReportOptions {
  groupBy: ReportGrouping;
}

export function accuracyPercent(correctCount: number, totalCount: number): number {
  return totalCount > 0 ? (correctCount / totalCount) * 100 : 0;
}

/** Read-only summary of a completed or partial session */
export function buildSessionReport(
  session: AdaptiveSession,
  opts?: Partial<ReportOptions>,
): SessionReport {
  const groupBy = opts?.groupBy ?? "topic";
  const responses = session.responses;

  const groups = new Map<string, { sum: number; n: number }>();
  for (const response of responses) {
    const topic = session.getItem(response.itemId)?.metadata.topic ?? "";
    const key = groupBy === "topic" && topic !== "" ? topic : response.itemId;
    const group = groups.get(key) ?? { sum: 0, n: 0 };
    group.sum += response.score;
    group.n += 1;
    groups.set(key, group);
  }

  const topicPerformance: Record<string, number> = Object.fromEntries(
    [...groups].map(([key, { sum, n }]) => [key, sum / n]),
  );

  const ability = session.currentAbility;
  const theta = ability?.theta ?? session.options.prior.theta;
  const se = ability?.standardError ?? session.options.prior.standardError;
  const correctCount = responses.filter((r) => r.isCorrect).length;
  const totalCount = responses.length;
  const ci = 1.96 * se;

  return {
    sessionId: session.id,
    learnerName: session.learner.name,
    finalAbility: theta,
    standardError: se,
    correctCount,
    totalCount,
    isComplete: session.isComplete,
    completionReason: session.completionReason,
    topicPerformance,
    accuracyPercent: accuracyPercent(correctCount, totalCount),
    normalizedScore: normalizedScore(theta),
    ciLower: theta - ci,
    ciUpper: theta + ci,
    abilityTrajectory: session.abilityHistory.map((a) => a.theta),
  };
}
