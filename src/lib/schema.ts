import { z } from "zod";

// === Config Schema (adaptest.config.yaml) ===
export const TerminationConfigSchema = z.object({
  target_se: z.number().positive().default(0.3),
  max_items: z.number().int().positive().default(25),
  mastery_theta: z.number().nullable().default(1.2),
  max_stall_count: z.number().int().positive().default(3),
  mastery_min_items: z.number().int().min(1).default(5),
});

export const EstimationConfigSchema = z
  .object({
    max_iterations: z.number().int().positive().default(25),
    tolerance: z.number().positive().default(1e-4),
    theta_min: z.number().default(-4),
    theta_max: z.number().default(4),
    max_step_halvings: z.number().int().min(0).default(10),
    stall_epsilon: z.number().positive().default(0.02),
  })
  .refine((e) => e.theta_min < e.theta_max, {
    message: "theta_min must be below theta_max",
    path: ["theta_min"],
  });

export const PriorConfigSchema = z.object({
  theta: z.number().default(-1.5),
  standard_error: z.number().positive().default(1.0),
});

export const ItemBankConfigSchema = z.object({
  path: z.string().default("./item-bank.yaml"),
});

export const StorageConfigSchema = z.object({
  database: z.string().default("adaptest.db"),
});

export const ReportsConfigSchema = z.object({
  output_dir: z.string().default("./adaptest-reports"),
  group_by: z.enum(["topic", "item"]).default("topic"),
});

export const AdaptestConfigSchema = z.object({
  version: z.string().default("1"),
  termination: TerminationConfigSchema.default({}),
  estimation: EstimationConfigSchema.default({}),
  prior: PriorConfigSchema.default({}),
  item_bank: ItemBankConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  reports: ReportsConfigSchema.default({}),
});

export type AdaptestConfig = z.infer<typeof AdaptestConfigSchema>;

// === Item Bank Schema (YAML / JSON) ===
const itemFormats = ["multiple-choice", "true-false", "short-answer"] as const;

export const ItemParameterSchema = z.object({
  difficulty: z.number(),
  discrimination: z.number().positive().default(1.0),
  guessing: z.number().min(0).lt(1).default(0.2),
});

export const ItemChoiceSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  isCorrect: z.boolean(),
});

export const ItemTemplateSchema = z
  .object({
    id: z.string().trim().min(1),
    stem: z.string().trim().min(1, "stem is required"),
    format: z.enum(itemFormats).default("multiple-choice"),
    choices: z.array(ItemChoiceSchema).default([]),
    parameter: ItemParameterSchema,
    metadata: z
      .object({
        topic: z.string().trim().default(""),
        subtopic: z.string().trim().default(""),
        explanation: z.string().trim().default(""),
        objective: z.string().trim().default(""),
      })
      .default({}),
  })
  .refine((item) => item.format !== "multiple-choice" || item.choices.length > 0, {
    message: "multiple-choice items require at least one choice",
    path: ["choices"],
  });

export const ItemBankFileSchema = z.union([
  z.array(ItemTemplateSchema),
  z.object({ items: z.array(ItemTemplateSchema) }).transform((file) => file.items),
]);

// === Session Snapshot Schema (persisted form of AdaptiveSession) ===
export const SNAPSHOT_VERSION = 1;

export const AbilityEstimateSchema = z.object({
  theta: z.number().finite(),
  standardError: z.number().finite().min(0),
  method: z.enum(["Prior", "MLE", "Bayes-Modal"]),
  timestamp: z.string().datetime(),
});

export const ItemResponseSchema = z.object({
  itemId: z.string().min(1),
  isCorrect: z.boolean(),
  score: z.number().min(0).max(1),
  responseTimeMs: z.number().finite().min(0),
  rawResponse: z.string(),
  abilityAfter: AbilityEstimateSchema,
});

const completionReasons = ["max-items", "target-se", "mastery", "stalled", "pool-exhausted"] as const;

export const SessionSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  id: z.string().min(1),
  learner: z.object({
    id: z.string().min(1),
    name: z.string(),
    objectives: z.array(z.string()).default([]),
  }),
  criteria: z.object({
    targetStandardError: z.number().positive(),
    maxItems: z.number().int().positive(),
    masteryTheta: z.number().nullable(),
    maxStallCount: z.number().int().positive(),
  }),
  options: z.object({
    prior: z.object({ theta: z.number(), standardError: z.number().positive() }),
    estimator: z.object({
      maxIterations: z.number().int().positive(),
      tolerance: z.number().positive(),
      thetaMin: z.number(),
      thetaMax: z.number(),
      maxStepHalvings: z.number().int().min(0),
    }),
    termination: z.object({ masteryMinItems: z.number().int().min(1) }),
    stallEpsilon: z.number().positive(),
  }),
  itemPoolIds: z.array(z.string().min(1)),
  status: z.enum(["not_started", "in_progress", "completed"]),
  completionReason: z.enum(completionReasons).nullable(),
  startedAt: z.string().datetime().nullable(),
  completedAt: z.string().datetime().nullable(),
  administeredItemIds: z.array(z.string().min(1)),
  responses: z.array(ItemResponseSchema),
  abilityHistory: z.array(AbilityEstimateSchema),
  stallCount: z.number().int().min(0),
  isComplete: z.boolean(),
});

export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;
