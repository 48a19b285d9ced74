import type {
  AbilityEstimate,
  TerminationCriteria,
  TerminationDecision,
  TerminationOptions,
} from "@adaptest/lib/types";

export function getDefaultCriteria(): TerminationCriteria {
  return {
    targetStandardError: 0.3,
    maxItems: 25,
    masteryTheta: 1.2,
    maxStallCount: 3,
  };
}

export const DEFAULT_TERMINATION_OPTIONS: TerminationOptions = {
  // a lucky start must not end the test on mastery alone
  masteryMinItems: 5,
};

/** Check the 4 stop criteria, in priority order */
export function checkTermination(
  ability: AbilityEstimate,
  itemsAdministered: number,
  stallCount: number,
  criteria: TerminationCriteria,
  options?: Partial<TerminationOptions>,
): TerminationDecision {
  const { masteryMinItems } = { ...DEFAULT_TERMINATION_OPTIONS, ...options };

  if (itemsAdministered === 0) {
    return { stop: false };
  }

  // 1. Max items reached
  if (itemsAdministered >= criteria.maxItems) {
    return { stop: true, reason: "max-items" };
  }

  // 2. SE at or below target
  if (ability.standardError <= criteria.targetStandardError) {
    return { stop: true, reason: "target-se" };
  }

  // 3. Mastery, once the minimum number of items is in
  if (
    criteria.masteryTheta !== null &&
    ability.theta >= criteria.masteryTheta &&
    itemsAdministered >= masteryMinItems
  ) {
    return { stop: true, reason: "mastery" };
  }

  // 4. Ability has stopped moving
  if (stallCount >= criteria.maxStallCount) {
    return { stop: true, reason: "stalled" };
  }

  return { stop: false };
}

export function shouldStop(
  ability: AbilityEstimate,
  itemsAdministered: number,
  stallCount: number,
  criteria: TerminationCriteria,
  options?: Partial<TerminationOptions>,
): boolean {
  return checkTermination(ability, itemsAdministered, stallCount, criteria, options).stop;
}
