import type { AssessmentService, TrackedSession } from "@adaptest/core/assessment";
import type { ItemTemplate, ResponseInput } from "@adaptest/lib/types";
import { probabilityCorrect } from "@adaptest/modules/engine/irt/model";

/** Seeded linear congruential generator, uniform on [0, 1] */
export function createRng(seed: number): () => number {
  let state = seed;
  return function next(): number {
    state = (state * 1103515245 + 12345) & 0x7fffffff;
    return state / 0x7fffffff;
  };
}

/** Answers items by sampling the 3PL response model at a fixed true ability */
export class SimulatedLearner {
  constructor(
    readonly trueTheta: number,
    private rng: () => number,
    private responseTimeMs = 1500,
  ) {}

  answer(item: ItemTemplate): ResponseInput {
    const isCorrect = this.rng() < probabilityCorrect(item.parameter, this.trueTheta);
    const choice = item.choices.find((c) => c.isCorrect === isCorrect);
    return {
      itemId: item.id,
      isCorrect,
      responseTimeMs: this.responseTimeMs,
      rawResponse: choice?.id ?? (isCorrect ? "correct" : "incorrect"),
    };
  }
}

/** Drive a tracked session until it completes. Returns the number of items answered. */
export function runSimulation(
  service: AssessmentService,
  tracked: TrackedSession,
  learner: SimulatedLearner,
): number {
  let answered = 0;
  for (let item = service.nextItem(tracked); item; item = service.nextItem(tracked)) {
    service.submitResponse(tracked, learner.answer(item));
    answered++;
  }
  return answered;
}
