import { z } from "zod";
import { CoreError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

const UINT32_MAX = 0xffffffff;
const MAX_ENTITY_INDEX = 0xfffe;

const ProbabilitySchema = z
  .number()
  .min(0, { error: "Probabilities must be within [0, 1]" })
  .max(1, { error: "Probabilities must be within [0, 1]" });

export const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);

export const MovementConfigSchema = z.object({
  allowDiagonal: z.boolean().default(false),
});

export const CombatConfigSchema = z
  .object({
    attackRange: z.number().int().min(1).default(1),
    baseHitChance: ProbabilitySchema.default(0.6),
    hitChancePerPoint: z.number().min(0).default(0.02),
    minHitChance: ProbabilitySchema.default(0.1),
    maxHitChance: ProbabilitySchema.default(0.95),
    minimumDamage: z.number().int().min(0).default(1),
  })
  .refine((c) => c.minHitChance <= c.maxHitChance, {
    message: "minHitChance must not exceed maxHitChance",
    path: ["minHitChance"],
  });

export const AIConfigSchema = z.object({
  detectionRange: z.number().int().min(0).default(8),
  fleeHealthThreshold: ProbabilitySchema.default(0.2),
  wanderChance: ProbabilitySchema.default(0.3),
});

export const CoreConfigSchema = z.object({
  maxEntities: z
    .number()
    .int()
    .min(1, { error: "maxEntities must be at least 1" })
    .max(MAX_ENTITY_INDEX + 1, { error: "maxEntities cannot exceed 65535" })
    .default(16384),
  seed: z
    .number()
    .int()
    .min(0, { error: "Seed must be a non-negative integer" })
    .max(UINT32_MAX, { error: "Seed must fit in uint32" })
    .default(0),
  logLevel: LogLevelSchema.default("warn"),
  movement: MovementConfigSchema.prefault({}),
  combat: CombatConfigSchema.prefault({}),
  ai: AIConfigSchema.prefault({}),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type CoreConfigInput = z.input<typeof CoreConfigSchema>;
export type CombatConfig = CoreConfig["combat"];
export type AIConfig = CoreConfig["ai"];

/**
 * Validates raw configuration and fills in defaults.
 */
export function parseCoreConfig(input: unknown = {}): Result<CoreConfig, CoreError> {
  const parsed = CoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      CoreError.configInvalid("Invalid core configuration", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      }),
    );
  }
  return Ok(parsed.data);
}

/**
 * Reads the environment overrides the host process may set.
 *
 * - DELVE_SEED: uint32 seed
 * - DELVE_LOG_LEVEL: silent | error | warn | info | debug
 * - DELVE_MAX_ENTITIES: entity capacity
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  overrides: CoreConfigInput = {},
): Result<CoreConfig, CoreError> {
  const fromEnv: Record<string, unknown> = {};
  if (env.DELVE_SEED !== undefined) fromEnv.seed = Number(env.DELVE_SEED);
  if (env.DELVE_LOG_LEVEL !== undefined) fromEnv.logLevel = env.DELVE_LOG_LEVEL;
  if (env.DELVE_MAX_ENTITIES !== undefined) {
    fromEnv.maxEntities = Number(env.DELVE_MAX_ENTITIES);
  }
  return parseCoreConfig({ ...overrides, ...fromEnv });
}
