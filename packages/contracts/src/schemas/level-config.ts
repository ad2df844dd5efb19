import { z } from "zod";

export interface GenerationLimits {
  readonly maxWalkers: number;
  readonly maxWalkerSteps: number;
}

/**
 * Limits for the default 80x43 level. The walker cap grows with the map
 * (see `walkerLimitFor`); a caller-supplied cap is used as given.
 *
 * The open-area drunkard preset starts every walker at the centre with a
 * fixed lifetime, so on large maps (300x300 and up) it can still run out
 * of walkers before reaching its floor target.
 */
export const DEFAULT_LIMITS: GenerationLimits = Object.freeze({
  maxWalkers: 20_000,
  maxWalkerSteps: 1_000_000,
});

/** Walkers allowed per map tile once the map outgrows the default cap */
export const WALKERS_PER_TILE = 4;

export function walkerLimitFor(width: number, height: number): number {
  return Math.max(DEFAULT_LIMITS.maxWalkers, WALKERS_PER_TILE * width * height);
}

export const LEVEL_DEFAULTS = Object.freeze({
  width: 80,
  height: 43,
  depth: 1,
  wfcChance: 1 / 3,
  wfcChunkSize: 8,
  maxSolverAttempts: 100,
  maxAttempts: 5,
});

const Dimension = (label: string, min: number) =>
  z
    .number()
    .int(`${label} must be an integer`)
    .min(min, `${label} must be at least ${min}`)
    .max(500, `${label} cannot exceed 500`);

/**
 * Loop ceilings for walker based strategies.
 */
export const GenerationLimitsSchema = z.object({
  maxWalkers: z.number().int().min(1).optional(),
  maxWalkerSteps: z.number().int().min(1).default(DEFAULT_LIMITS.maxWalkerSteps),
});

/**
 * Level generation request as accepted from callers.
 */
export const LevelConfigSchema = z
  .object({
    width: Dimension("Width", 20).default(LEVEL_DEFAULTS.width),
    height: Dimension("Height", 20).default(LEVEL_DEFAULTS.height),
    depth: z.number().int().min(1, "Depth starts at 1").default(LEVEL_DEFAULTS.depth),
    seed: z
      .number()
      .int("Seed must be an integer")
      .min(0)
      .max(0xffffffff, "Seed must fit in 32 bits")
      .optional(),
    strategy: z.string().min(1).optional(),
    wfc: z.boolean().optional(),
    wfcChance: z.number().min(0).max(1).default(LEVEL_DEFAULTS.wfcChance),
    wfcChunkSize: z.number().int().min(3).max(16).default(LEVEL_DEFAULTS.wfcChunkSize),
    maxSolverAttempts: z.number().int().min(1).max(10_000).default(LEVEL_DEFAULTS.maxSolverAttempts),
    maxAttempts: z.number().int().min(1).max(100).default(LEVEL_DEFAULTS.maxAttempts),
    limits: GenerationLimitsSchema.default({ maxWalkerSteps: DEFAULT_LIMITS.maxWalkerSteps }),
  })
  .superRefine((data, ctx) => {
    if (data.wfcChunkSize * 2 > Math.min(data.width, data.height)) {
      ctx.addIssue({
        code: "custom",
        message: "Chunk size leaves fewer than two chunks per axis",
        path: ["wfcChunkSize"],
      });
    }
  })
  .transform((data) => {
    const limits: GenerationLimits = {
      maxWalkers: data.limits.maxWalkers ?? walkerLimitFor(data.width, data.height),
      maxWalkerSteps: data.limits.maxWalkerSteps,
    };
    return { ...data, limits };
  });

export type LevelConfigInput = z.input<typeof LevelConfigSchema>;
export type LevelConfig = z.output<typeof LevelConfigSchema>;
