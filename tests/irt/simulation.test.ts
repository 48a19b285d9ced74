import { AssessmentService } from "@adaptest/core/assessment";
import { EventBus } from "@adaptest/core/event-bus";
import { configToEngineSettings, parseConfig } from "@adaptest/lib/config";
import { createTestDatabase } from "@adaptest/lib/db";
import { runMigrations } from "@adaptest/lib/migrations";
import { SessionRepository } from "@adaptest/lib/repositories/sessions";
import type { ItemTemplate } from "@adaptest/lib/types";
import { startSession } from "@adaptest/modules/engine/session";
import { ItemBank } from "@adaptest/modules/item-bank/loader";
import { SimulatedLearner, createRng, runSimulation } from "@adaptest/modules/simulation/learner";
import { describe, expect, test } from "vitest";

const learner = { id: "sim", name: "Simulated", objectives: [] };

/** Generate a pool of items with varied parameters */
function generateItemPool(n: number, rng: () => number): ItemTemplate[] {
  const items: ItemTemplate[] = [];
  for (let i = 0; i < n; i++) {
    items.push({
      id: `pool-${String(i).padStart(3, "0")}`,
      stem: `Generated item ${i}`,
      format: "short-answer",
      choices: [],
      parameter: {
        discrimination: 1.0 + rng() * 1.5, // 1.0 to 2.5
        difficulty: -3 + rng() * 6, // -3 to +3
        guessing: rng() * 0.15, // 0 to 0.15
      },
      metadata: {
        topic: i % 2 === 0 ? "Algebra" : "Geometry",
        subtopic: "",
        explanation: "",
        objective: "",
      },
    });
  }
  return items;
}

/** Pearson correlation coefficient */
function pearsonR(x: number[], y: number[]): number {
  const n = x.length;
  const meanX = x.reduce((a, b) => a + b, 0) / n;
  const meanY = y.reduce((a, b) => a + b, 0) / n;
  let num = 0;
  let denX = 0;
  let denY = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    num += dx * dy;
    denX += dx * dx;
    denY += dy * dy;
  }
  if (denX === 0 || denY === 0) return 0;
  return num / Math.sqrt(denX * denY);
}

describe("createRng", () => {
  test("is deterministic per seed and stays in [0, 1]", () => {
    const a = createRng(7);
    const b = createRng(7);
    for (let i = 0; i < 100; i++) {
      const value = a();
      expect(value).toBe(b());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });
});

describe("SimulatedLearner", () => {
  test("answers with the choice matching correctness", () => {
    const item: ItemTemplate = {
      id: "mc-1",
      stem: "Pick one",
      format: "multiple-choice",
      choices: [
        { id: "a", text: "right", isCorrect: true },
        { id: "b", text: "wrong", isCorrect: false },
      ],
      parameter: { difficulty: 0, discrimination: 1, guessing: 0 },
      metadata: { topic: "", subtopic: "", explanation: "", objective: "" },
    };
    // p(correct) = 1 - 6e-16 at theta = 50, and 6e-16 at theta = -50
    const strong = new SimulatedLearner(50, createRng(1)).answer(item);
    const weak = new SimulatedLearner(-50, createRng(1)).answer(item);

    expect(strong).toEqual({
      itemId: "mc-1",
      isCorrect: true,
      responseTimeMs: 1500,
      rawResponse: "a",
    });
    expect(weak.isCorrect).toBe(false);
    expect(weak.rawResponse).toBe("b");
  });
});

describe("CAT simulation (acceptance)", () => {
  test("recovers ability across 40 simulated learners", () => {
    const rng = createRng(12345);
    const pool = generateItemPool(60, rng);

    const trueThetas: number[] = [];
    const estimatedThetas: number[] = [];
    const itemsUsed: number[] = [];

    for (let s = 0; s < 40; s++) {
      const trueTheta = -2.5 + (s / 39) * 5; // -2.5 to +2.5
      const simulated = new SimulatedLearner(trueTheta, rng);
      const session = startSession({
        learner,
        itemPool: pool,
        criteria: { targetStandardError: 0.3, maxItems: 40, masteryTheta: null, maxStallCount: 100 },
      });

      for (let item = session.advanceToNextItem(); item; ) {
        session.recordResponse(simulated.answer(item));
        item = session.isComplete ? null : session.advanceToNextItem();
      }

      const final = session.currentAbility;
      if (!final) throw new Error("expected an estimate");
      trueThetas.push(trueTheta);
      estimatedThetas.push(final.theta);
      itemsUsed.push(session.responses.length);

      expect(new Set(session.administeredItemIds).size).toBe(session.responses.length);
      expect(final.theta).toBeGreaterThanOrEqual(-4);
      expect(final.theta).toBeLessThanOrEqual(4);
    }

    const meanItems = itemsUsed.reduce((a, b) => a + b, 0) / itemsUsed.length;
    expect(pearsonR(trueThetas, estimatedThetas)).toBeGreaterThan(0.85);
    expect(meanItems).toBeLessThanOrEqual(40);
  });

  test("runSimulation drives a persisted session to completion deterministically", async () => {
    const run = async (seed: number) => {
      const db = await createTestDatabase();
      runMigrations(db);
      const bank = new ItemBank();
      bank.add(generateItemPool(30, createRng(99)));
      const service = new AssessmentService({
        bus: new EventBus(),
        bank,
        sessions: new SessionRepository(db),
        settings: configToEngineSettings(parseConfig({ termination: { max_items: 12 } })),
      });

      const tracked = service.startSession(learner, { topic: "algebra" });
      const answered = runSimulation(service, tracked, new SimulatedLearner(0.5, createRng(seed)));
      const row = new SessionRepository(db).findById(tracked.session.id);
      db.close();
      return { answered, tracked, row };
    };

    const first = await run(2024);
    const second = await run(2024);

    expect(first.tracked.session.isComplete).toBe(true);
    expect(first.answered).toBe(first.tracked.session.responses.length);
    expect(first.answered).toBeLessThanOrEqual(12);
    expect(first.tracked.session.itemPool).toHaveLength(15);
    expect(first.row?.status).toBe("completed");
    // one save on start, one per response
    expect(first.row?.revision).toBe(first.answered + 1);
    expect(second.tracked.session.administeredItemIds).toEqual(
      first.tracked.session.administeredItemIds,
    );
    expect(second.tracked.session.abilityHistory.map((a) => a.theta)).toEqual(
      first.tracked.session.abilityHistory.map((a) => a.theta),
    );
  });
});
