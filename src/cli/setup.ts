import { AssessmentService } from "@adaptest/core/assessment";
import { ERROR_CODES, isAdaptestError } from "@adaptest/core/errors";
import { EventBus } from "@adaptest/core/event-bus";
import { attachLogger } from "@adaptest/core/logger";
import { configToEngineSettings, loadConfig, parseConfig } from "@adaptest/lib/config";
import { getDatabase } from "@adaptest/lib/db";
import { runMigrations } from "@adaptest/lib/migrations";
import { SessionRepository } from "@adaptest/lib/repositories/sessions";
import type { AdaptestConfig } from "@adaptest/lib/schema";
import { ItemBank } from "@adaptest/modules/item-bank/loader";
import { consola } from "consola";

/** Load the config file, or fall back to defaults when none exists */
export async function loadConfigOrDefaults(path?: string): Promise<AdaptestConfig> {
  try {
    return await loadConfig(path);
  } catch (err) {
    if (!isAdaptestError(err, ERROR_CODES.CONFIG_NOT_FOUND) || path) throw err;
    consola.warn("No adaptest.config.yaml found, using defaults.");
    return parseConfig({});
  }
}

export interface CliContext {
  config: AdaptestConfig;
  bus: EventBus;
  bank: ItemBank;
  sessions: SessionRepository;
  service: AssessmentService;
}

/** Wire the database, item bank and assessment service for a command */
export async function createContext(config: AdaptestConfig): Promise<CliContext> {
  const db = await getDatabase(config.storage.database);
  runMigrations(db);

  const bank = new ItemBank();
  await bank.load(config.item_bank.path);

  const bus = new EventBus();
  attachLogger(bus);

  const sessions = new SessionRepository(db);
  const service = new AssessmentService({
    bus,
    bank,
    sessions,
    settings: configToEngineSettings(config),
  });

  return { config, bus, bank, sessions, service };
}
