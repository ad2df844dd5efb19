/**
 * Generation API
 *
 * Picks a strategy, optionally re-synthesises its output through Wave
 * Function Collapse, and hands back a finished level.
 */

import {
  DungeonError,
  type LevelConfig,
  type LevelConfigInput,
  randomUint32,
  type RandomSource,
  SeededRandom,
  type SpawnSink,
} from "@descent/contracts";
import { resolveLevelConfig } from "./config";
import type { Point } from "./core/geometry/types";
import type { Grid } from "./core/grid/grid";
import type {
  MapStrategy,
  SnapshotObserver,
  StrategyContext,
} from "./generators/base/map-strategy";
import { createStrategy, getAvailableStrategies } from "./generators/registry";
import { isStrategyId, STRATEGY_IDS, type StrategyId } from "./generators/strategy-ids";
import { WfcDerivedGenerator } from "./generators/wfc/generator";
import { createLogger, type Logger } from "./logger";
import type { RegionMap } from "./passes/regions/noise-regions";

export { getAvailableStrategies };

/**
 * Level request: the config fields plus the hooks that cannot be
 * expressed as data.
 */
export interface GenerateLevelOptions extends LevelConfigInput {
  /** Receives grid copies while strategies work */
  readonly onSnapshot?: SnapshotObserver;
  /** Receives the spawn placements of the finished level */
  readonly spawnSink?: SpawnSink;
  /** Parent for the generator's child loggers */
  readonly logger?: Logger;
}

export interface GeneratedLevel {
  /** Finished map with exactly one down staircase */
  readonly map: Grid;
  readonly start: Point;
  readonly exit: Point;
  readonly regions: RegionMap;
  /** Strategy drawn from the registry */
  readonly strategy: StrategyId;
  /** Whether the map was re-synthesised through WFC */
  readonly derivedThroughWfc: boolean;
  readonly seed: number;
  /** Attempts used, starting at 1 */
  readonly attempts: number;
}

/**
 * Result of `tryGenerateLevel`.
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type GenerationResult =
  | { readonly success: true; readonly level: GeneratedLevel }
  | { readonly success: false; readonly error: DungeonError };

/**
 * Generate a level.
 *
 * The same config and seed always give the same level. Attempts that
 * end in an unusable layout are retried on the same random stream.
 *
 * @example
 * ```typescript
 * const level = generateLevel({ seed: 12345, depth: 3 });
 * console.log(renderAscii(level.map, { marks: [{ point: level.start, char: "@" }] }));
 * ```
 *
 * @throws DungeonError CONFIG_INVALID, STRATEGY_NOT_FOUND or GENERATION_FAILED
 */
export function generateLevel(options: GenerateLevelOptions = {}): GeneratedLevel {
  const { onSnapshot, spawnSink, logger: parent, ...input } = options;
  const config = resolveLevelConfig(input);
  const seed = config.seed ?? randomUint32();
  const rng = new SeededRandom(seed);
  const log = createLogger("orchestrator", parent);

  log.debug({ seed, width: config.width, height: config.height }, "Generating level");

  let lastError: DungeonError | undefined;
  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const hooks = { onSnapshot, spawnSink, parent };
      return { ...runAttempt(config, rng, log, hooks), seed, attempts: attempt };
    } catch (error) {
      if (!DungeonError.isFatalAttemptError(error)) throw error;
      lastError = error;
      log.warn({ attempt, seed, code: error.code, details: error.details }, "Retrying level");
    }
  }

  throw DungeonError.generationFailed(`No usable level after ${config.maxAttempts} attempts`, {
    seed,
    attempts: config.maxAttempts,
    lastError: lastError?.toJSON(),
  });
}

/**
 * Like `generateLevel`, but returns generation errors instead of
 * throwing them.
 */
export function tryGenerateLevel(options: GenerateLevelOptions = {}): GenerationResult {
  try {
    return { success: true, level: generateLevel(options) };
  } catch (error) {
    if (DungeonError.isDungeonError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

interface AttemptHooks {
  readonly onSnapshot?: SnapshotObserver;
  readonly spawnSink?: SpawnSink;
  readonly parent?: Logger;
}

type AttemptResult = Omit<GeneratedLevel, "seed" | "attempts">;

function runAttempt(
  config: LevelConfig,
  rng: RandomSource,
  log: Logger,
  hooks: AttemptHooks,
): AttemptResult {
  const id = pickStrategy(config, rng);
  const context = (strategy: string): StrategyContext => ({
    width: config.width,
    height: config.height,
    depth: config.depth,
    rng,
    logger: createLogger("strategy", hooks.parent).child({ strategy }),
    limits: config.limits,
    onSnapshot: hooks.onSnapshot,
  });

  const base = createStrategy(id, context(id));
  base.build();

  let final: MapStrategy = base;
  if (shouldDeriveThroughWfc(config, rng)) {
    const derived = new WfcDerivedGenerator(context("wfc-derived"), base.getMap(), {
      chunkSize: config.wfcChunkSize,
      maxSolverAttempts: config.maxSolverAttempts,
    });
    try {
      derived.build();
      final = derived;
    } catch (error) {
      if (!isRecoverableWfcError(error)) throw error;
      log.warn(
        { strategy: id, code: error.code, details: error.details },
        "WFC derivation failed, keeping the source map",
      );
    }
  }

  if (hooks.spawnSink) final.spawn(hooks.spawnSink);

  return {
    map: final.getMap().finalize(),
    start: final.getStartingPosition(),
    exit: final.getExit(),
    regions: final.getRegions(),
    strategy: id,
    derivedThroughWfc: final !== base,
  };
}

function pickStrategy(config: LevelConfig, rng: RandomSource): StrategyId {
  if (config.strategy !== undefined) {
    if (isStrategyId(config.strategy)) return config.strategy;
    throw new DungeonError("STRATEGY_NOT_FOUND", `Unknown strategy: ${config.strategy}`, {
      strategy: config.strategy,
    });
  }
  return STRATEGY_IDS[rng.rollDice(1, STRATEGY_IDS.length) - 1];
}

/**
 * A forced flag consumes no randomness; otherwise one draw decides.
 */
function shouldDeriveThroughWfc(config: LevelConfig, rng: RandomSource): boolean {
  if (config.wfc !== undefined) return config.wfc;
  return rng.next() < config.wfcChance;
}

function isRecoverableWfcError(error: unknown): error is DungeonError {
  return (
    DungeonError.isFatalAttemptError(error) ||
    (DungeonError.isDungeonError(error) && error.code === "SOLVER_RETRIES_EXHAUSTED")
  );
}
