import { closeDatabase, getDatabase } from "@adaptest/lib/db";
import { runMigrations } from "@adaptest/lib/migrations";
import { type SessionRow, SessionRepository } from "@adaptest/lib/repositories/sessions";
import { EXIT_CODES } from "@adaptest/lib/types";
import { defineCommand } from "citty";
import { consola } from "consola";
import { loadConfigOrDefaults } from "../setup";

export function formatSessionRow(row: SessionRow): string {
  const ability =
    row.theta === null || row.se === null
      ? "θ=n/a"
      : `θ=${row.theta.toFixed(2)} SE=${row.se.toFixed(2)}`;
  const status = row.completion_reason ? `${row.status} (${row.completion_reason})` : row.status;
  return `${row.id}  ${row.topic ?? "all topics"}  ${row.n_items} items  ${ability}  ${status}`;
}

export default defineCommand({
  meta: { name: "sessions", version: "0.1.0", description: "List a learner's sessions" },
  args: {
    learner: { type: "string", required: true, description: "Learner ID" },
    limit: { type: "string", description: "Max completed sessions to show", default: "50" },
    config: { type: "string", description: "Config file path" },
  },
  async run({ args }) {
    try {
      const config = await loadConfigOrDefaults(args.config);
      const db = await getDatabase(config.storage.database);
      runMigrations(db);
      const sessions = new SessionRepository(db);

      const active = sessions.findActive(args.learner);
      const completed = sessions.findCompleted(args.learner, Number.parseInt(args.limit, 10) || 50);

      if (active.length === 0 && completed.length === 0) {
        consola.info(`No sessions for learner ${args.learner}`);
      }
      if (active.length > 0) {
        consola.log(`Active (${active.length}):`);
        for (const row of active) consola.log(`  ${formatSessionRow(row)}`);
      }
      if (completed.length > 0) {
        consola.log(`Completed (${completed.length}):`);
        for (const row of completed) consola.log(`  ${formatSessionRow(row)}`);
      }
      closeDatabase();
    } catch (err) {
      consola.error("Listing sessions failed:", err instanceof Error ? err.message : String(err));
      closeDatabase();
      process.exit(EXIT_CODES.ERROR);
    }
  },
});
