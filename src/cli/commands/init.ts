import { existsSync } from "node:fs";
import { CONFIG_FILE_NAMES, writeConfig } from "@adaptest/lib/config";
import { AdaptestConfigSchema } from "@adaptest/lib/schema";
import { EXIT_CODES } from "@adaptest/lib/types";
import { defineCommand } from "citty";
import { consola } from "consola";

export default defineCommand({
  meta: {
    name: "init",
    version: "0.1.0",
    description: "Write an adaptest.config.yaml with default settings",
  },
  args: {
    "item-bank": {
      type: "string",
      description: "Item bank file or directory",
      default: "./item-bank.yaml",
    },
    database: { type: "string", description: "SQLite database path", default: "adaptest.db" },
    force: { type: "boolean", description: "Overwrite an existing config", default: false },
  },
  async run({ args }) {
    const outputPath = CONFIG_FILE_NAMES[0];
    if (existsSync(outputPath) && !args.force) {
      consola.error(`${outputPath} already exists. Use --force to overwrite it.`);
      process.exit(EXIT_CODES.ERROR);
    }

    const result = AdaptestConfigSchema.safeParse({
      version: "1",
      item_bank: { path: args["item-bank"] },
      storage: { database: args.database },
    });
    if (!result.success) {
      consola.error("Invalid configuration:", result.error.issues);
      process.exit(EXIT_CODES.ERROR);
    }

    await writeConfig(result.data, outputPath);
    consola.success(`Config written to ${outputPath}`);
    consola.info("Run `adaptest simulate --learner <name> --theta <value>` to try a session.");
  },
});
