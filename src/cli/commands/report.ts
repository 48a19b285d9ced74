import { closeDatabase } from "@adaptest/lib/db";
import { EXIT_CODES, type ReportGrouping } from "@adaptest/lib/types";
import { JsonReporter } from "@adaptest/modules/report/json-reporter";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createContext, loadConfigOrDefaults } from "../setup";

function parseGrouping(value: string | undefined): ReportGrouping | undefined {
  if (value === undefined) return undefined;
  if (value === "topic" || value === "item") return value;
  consola.error(`--group-by must be "topic" or "item", got "${value}"`);
  process.exit(EXIT_CODES.ERROR);
}

export default defineCommand({
  meta: { name: "report", version: "0.1.0", description: "Write a session report as JSON" },
  args: {
    session: { type: "string", required: true, description: "Session ID" },
    "group-by": { type: "string", description: "Group performance by topic | item" },
    output: { type: "string", description: "Output directory (overrides config)" },
    config: { type: "string", description: "Config file path" },
  },
  async run({ args }) {
    const groupBy = parseGrouping(args["group-by"]);

    try {
      const config = await loadConfigOrDefaults(args.config);
      const { service } = await createContext(config);

      const tracked = service.resumeSession(args.session);
      const report = service.generateReport(tracked, groupBy);
      const path = await new JsonReporter().generate(
        report,
        args.output ?? config.reports.output_dir,
      );
      consola.success(`JSON report: ${path}`);
      closeDatabase();
    } catch (err) {
      consola.error("Report generation failed:", err instanceof Error ? err.message : String(err));
      closeDatabase();
      process.exit(EXIT_CODES.ERROR);
    }
  },
});
