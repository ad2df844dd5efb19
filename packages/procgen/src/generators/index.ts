/**
 * Generators module - level generation strategies.
 */

export * from "./base/map-strategy";
export * from "./registry";
export * from "./strategy-ids";

// Room based
export { BspDungeonGenerator } from "./bsp-dungeon/generator";
export { BspInteriorGenerator } from "./bsp-interior/generator";
export { SimpleRoomsGenerator } from "./simple-rooms/generator";

// Cave and open area
export { CellularAutomataGenerator } from "./cellular-automata/generator";
export * from "./dla/constants";
export { DlaGenerator } from "./dla/generator";
export * from "./drunkard/constants";
export { DrunkardWalkGenerator } from "./drunkard/generator";
export { MazeGenerator } from "./maze/generator";
export { type DistanceMetric, VoronoiGenerator } from "./voronoi/generator";

// Wave Function Collapse
export {
  buildPatterns,
  type MapChunk,
  type Pattern,
  patternsToConstraints,
  sidesAgree,
} from "./wfc/patterns";
export { solveChunks, WfcSolver } from "./wfc/solver";
export { WfcDerivedGenerator, type WfcOptions } from "./wfc/generator";
