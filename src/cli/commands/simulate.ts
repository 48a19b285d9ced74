import { closeDatabase } from "@adaptest/lib/db";
import { EXIT_CODES, type SessionReport } from "@adaptest/lib/types";
import { SimulatedLearner, createRng, runSimulation } from "@adaptest/modules/simulation/learner";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createContext, loadConfigOrDefaults } from "../setup";

export function formatReport(report: SessionReport): string {
  const lines = [
    `Learner:   ${report.learnerName}`,
    `Session:   ${report.sessionId}`,
    `Ability:   θ=${report.finalAbility.toFixed(3)} SE=${report.standardError.toFixed(3)} (95% CI ${report.ciLower.toFixed(2)} .. ${report.ciUpper.toFixed(2)})`,
    `Score:     ${report.normalizedScore.toFixed(1)}/100`,
    `Accuracy:  ${report.correctCount}/${report.totalCount} (${report.accuracyPercent.toFixed(1)}%)`,
    `Status:    ${report.isComplete ? `completed (${report.completionReason})` : "in progress"}`,
  ];
  const groups = Object.entries(report.topicPerformance);
  if (groups.length > 0) {
    lines.push("Performance:");
    for (const [key, value] of groups) {
      lines.push(`  ${key.padEnd(24)} ${(value * 100).toFixed(0)}%`);
    }
  }
  return lines.join("\n");
}

export default defineCommand({
  meta: {
    name: "simulate",
    version: "0.1.0",
    description: "Run a seeded simulated learner through an adaptive session",
  },
  args: {
    learner: { type: "string", required: true, description: "Learner name" },
    theta: { type: "string", required: true, description: "True ability of the simulated learner" },
    topic: { type: "string", description: "Restrict the item pool to one topic" },
    seed: { type: "string", description: "Random seed", default: "42" },
    config: { type: "string", description: "Config file path" },
  },
  async run({ args }) {
    const trueTheta = Number.parseFloat(args.theta);
    const seed = Number.parseInt(args.seed, 10);
    if (!Number.isFinite(trueTheta) || !Number.isInteger(seed)) {
      consola.error("--theta must be a number and --seed an integer");
      process.exit(EXIT_CODES.ERROR);
    }

    try {
      const config = await loadConfigOrDefaults(args.config);
      const { service } = await createContext(config);

      const learnerId = args.learner.trim().toLowerCase().replace(/\s+/g, "-");
      const tracked = service.startSession(
        { id: learnerId, name: args.learner, objectives: [] },
        { topic: args.topic },
      );
      const learner = new SimulatedLearner(trueTheta, createRng(seed));
      runSimulation(service, tracked, learner);

      const report = service.generateReport(tracked);
      consola.box(formatReport(report));
      closeDatabase();
    } catch (err) {
      consola.error("Simulation failed:", err instanceof Error ? err.message : String(err));
      closeDatabase();
      process.exit(EXIT_CODES.ERROR);
    }
  },
});
