/**
 * Descent - Procedural Level Generation
 *
 * Fifteen map strategies, an optional Wave Function Collapse pass over
 * their output, connectivity pruning, spawn regions and a seeded
 * orchestrator that ties them together.
 *
 * @example
 * ```typescript
 * import { generateLevel, renderAscii } from "@descent/procgen";
 *
 * const level = generateLevel({ seed: 12345, depth: 2 });
 * console.log(`${level.strategy} (wfc: ${level.derivedThroughWfc})`);
 * console.log(renderAscii(level.map));
 * ```
 */

// High-level API
export * from "./api";
export { resolveLevelConfig } from "./config";

// Core
export * from "./core/constants";
export * from "./core/geometry";
export { Grid } from "./core/grid/grid";
export { DijkstraMap } from "./core/pathfinding/dijkstra-map";
export { cellValue, cellValueNoise } from "./core/noise/cellular-noise";

// Strategies
export * from "./generators";

// Passes
export * from "./passes/connectivity/reachability";
export * from "./passes/regions/noise-regions";
export * from "./passes/content/spawn-table";
export * from "./passes/content/region-spawner";

// Utilities
export { createLogger, logger, type Logger } from "./logger";
export * from "./utils/ascii-renderer";
