import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ERROR_CODES, createModuleError } from "@adaptest/core/errors";
import type { ReportGrouping, TerminationCriteria } from "@adaptest/lib/types";
import type { SessionOptionsInput } from "@adaptest/modules/engine/session";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { type AdaptestConfig, AdaptestConfigSchema } from "./schema";

export const CONFIG_FILE_NAMES = ["adaptest.config.yaml", "adaptest.config.yml"];

/** Find config file walking up directories */
export function findConfigFile(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();

  for (let i = 0; i < 10; i++) {
    for (const name of CONFIG_FILE_NAMES) {
      const path = join(dir, name);
      if (existsSync(path)) return path;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

/** Interpolate ${VAR} from the environment */
export function interpolateEnvVars(
  obj: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] ?? "");
  }
  if (Array.isArray(obj)) return obj.map((value) => interpolateEnvVars(value, env));
  if (obj && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/** Validate an already-parsed config object */
export function parseConfig(raw: unknown): AdaptestConfig {
  const result = AdaptestConfigSchema.safeParse(interpolateEnvVars(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw createModuleError("config", ERROR_CODES.CONFIG_INVALID, `Invalid config: ${issues}`);
  }
  return result.data;
}

/** Load and validate config */
export async function loadConfig(path?: string): Promise<AdaptestConfig> {
  const configPath = path ?? findConfigFile();
  if (!configPath) {
    throw createModuleError(
      "config",
      ERROR_CODES.CONFIG_NOT_FOUND,
      "Config file not found. Run `adaptest init` first.",
    );
  }

  if (!existsSync(configPath)) {
    throw createModuleError(
      "config",
      ERROR_CODES.CONFIG_NOT_FOUND,
      `Config file not found: ${configPath}`,
    );
  }

  const content = await readFile(configPath, "utf8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw createModuleError(
      "config",
      ERROR_CODES.CONFIG_INVALID,
      `Config is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseConfig(raw);
}

/** Write config to YAML file */
export async function writeConfig(config: Partial<AdaptestConfig>, path: string): Promise<void> {
  const yaml = stringifyYaml(config, { lineWidth: 100 });
  await writeFile(path, yaml, "utf8");
}

export interface EngineSettings {
  criteria: TerminationCriteria;
  options: SessionOptionsInput;
  groupBy: ReportGrouping;
}

/** Convert AdaptestConfig to the settings the engine takes */
export function configToEngineSettings(config: AdaptestConfig): EngineSettings {
  return {
    criteria: {
      targetStandardError: config.termination.target_se,
      maxItems: config.termination.max_items,
      masteryTheta: config.termination.mastery_theta,
      maxStallCount: config.termination.max_stall_count,
    },
    options: {
      prior: { theta: config.prior.theta, standardError: config.prior.standard_error },
      estimator: {
        maxIterations: config.estimation.max_iterations,
        tolerance: config.estimation.tolerance,
        thetaMin: config.estimation.theta_min,
        thetaMax: config.estimation.theta_max,
        maxStepHalvings: config.estimation.max_step_halvings,
      },
      termination: { masteryMinItems: config.termination.mastery_min_items },
      stallEpsilon: config.estimation.stall_epsilon,
    },
    groupBy: config.reports.group_by,
  };
}
