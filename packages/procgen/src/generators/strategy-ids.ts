/**
 * Identifiers of the strategies the selector can draw from. The order
 * is the dice order: a roll of 1 picks the first entry.
 */
export const STRATEGY_IDS = [
  "simple-rooms",
  "bsp-dungeon",
  "bsp-interior",
  "cellular-automata",
  "drunkard-open-area",
  "drunkard-open-halls",
  "drunkard-winding-passages",
  "maze",
  "dla-walk-inwards",
  "dla-walk-outwards",
  "dla-central-attractor",
  "dla-insectoid",
  "voronoi-pythagoras",
  "voronoi-manhattan",
  "voronoi-chebyshev",
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

/** The WFC wrapper is never drawn on its own */
export const WFC_STRATEGY_ID = "wfc-derived";

export type AnyStrategyId = StrategyId | typeof WFC_STRATEGY_ID;

const STRATEGY_ID_SET: ReadonlySet<string> = new Set(STRATEGY_IDS);

export function isStrategyId(value: string): value is StrategyId {
  return STRATEGY_ID_SET.has(value);
}
