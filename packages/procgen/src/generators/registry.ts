/**
 * Strategy registry
 *
 * The closed set of strategies the selector draws from, in dice order.
 */

import { DungeonError } from "@descent/contracts";
import type { MapStrategy, StrategyContext } from "./base/map-strategy";
import { BspDungeonGenerator } from "./bsp-dungeon/generator";
import { BspInteriorGenerator } from "./bsp-interior/generator";
import { CellularAutomataGenerator } from "./cellular-automata/generator";
import {
  CENTRAL_ATTRACTOR,
  INSECTOID,
  WALK_INWARDS,
  WALK_OUTWARDS,
} from "./dla/constants";
import { DlaGenerator } from "./dla/generator";
import { OPEN_AREA, OPEN_HALLS, WINDING_PASSAGES } from "./drunkard/constants";
import { DrunkardWalkGenerator } from "./drunkard/generator";
import { MazeGenerator } from "./maze/generator";
import { SimpleRoomsGenerator } from "./simple-rooms/generator";
import { isStrategyId, STRATEGY_IDS, type StrategyId } from "./strategy-ids";
import { VoronoiGenerator } from "./voronoi/generator";

export interface StrategyEntry {
  readonly id: StrategyId;
  readonly name: string;
  create(context: StrategyContext): MapStrategy;
}

const entry = (
  id: StrategyId,
  name: string,
  create: (context: StrategyContext, id: StrategyId, name: string) => MapStrategy,
): StrategyEntry => ({ id, name, create: (context) => create(context, id, name) });

const ENTRIES: Record<StrategyId, StrategyEntry> = {
  "simple-rooms": entry("simple-rooms", "Simple Rooms", (ctx) => new SimpleRoomsGenerator(ctx)),
  "bsp-dungeon": entry("bsp-dungeon", "BSP Dungeon", (ctx) => new BspDungeonGenerator(ctx)),
  "bsp-interior": entry("bsp-interior", "BSP Interior", (ctx) => new BspInteriorGenerator(ctx)),
  "cellular-automata": entry(
    "cellular-automata",
    "Cellular Automata",
    (ctx) => new CellularAutomataGenerator(ctx),
  ),
  "drunkard-open-area": entry(
    "drunkard-open-area",
    "Drunkard's Walk (open area)",
    (ctx, id, name) => new DrunkardWalkGenerator(ctx, id, name, OPEN_AREA),
  ),
  "drunkard-open-halls": entry(
    "drunkard-open-halls",
    "Drunkard's Walk (open halls)",
    (ctx, id, name) => new DrunkardWalkGenerator(ctx, id, name, OPEN_HALLS),
  ),
  "drunkard-winding-passages": entry(
    "drunkard-winding-passages",
    "Drunkard's Walk (winding passages)",
    (ctx, id, name) => new DrunkardWalkGenerator(ctx, id, name, WINDING_PASSAGES),
  ),
  maze: entry("maze", "Maze", (ctx) => new MazeGenerator(ctx)),
  "dla-walk-inwards": entry(
    "dla-walk-inwards",
    "DLA (walk inwards)",
    (ctx, id, name) => new DlaGenerator(ctx, id, name, WALK_INWARDS),
  ),
  "dla-walk-outwards": entry(
    "dla-walk-outwards",
    "DLA (walk outwards)",
    (ctx, id, name) => new DlaGenerator(ctx, id, name, WALK_OUTWARDS),
  ),
  "dla-central-attractor": entry(
    "dla-central-attractor",
    "DLA (central attractor)",
    (ctx, id, name) => new DlaGenerator(ctx, id, name, CENTRAL_ATTRACTOR),
  ),
  "dla-insectoid": entry(
    "dla-insectoid",
    "DLA (insectoid)",
    (ctx, id, name) => new DlaGenerator(ctx, id, name, INSECTOID),
  ),
  "voronoi-pythagoras": entry(
    "voronoi-pythagoras",
    "Voronoi (pythagoras)",
    (ctx, id, name) => new VoronoiGenerator(ctx, id, name, "pythagoras"),
  ),
  "voronoi-manhattan": entry(
    "voronoi-manhattan",
    "Voronoi (manhattan)",
    (ctx, id, name) => new VoronoiGenerator(ctx, id, name, "manhattan"),
  ),
  "voronoi-chebyshev": entry(
    "voronoi-chebyshev",
    "Voronoi (chebyshev)",
    (ctx, id, name) => new VoronoiGenerator(ctx, id, name, "chebyshev"),
  ),
};

/** Registry entries in dice order */
export const STRATEGIES: readonly StrategyEntry[] = STRATEGY_IDS.map((id) => ENTRIES[id]);

export function getStrategyEntry(id: string): StrategyEntry {
  if (!isStrategyId(id)) {
    throw new DungeonError("STRATEGY_NOT_FOUND", `Unknown strategy: ${id}`, {
      strategy: id,
      available: [...STRATEGY_IDS],
    });
  }
  return ENTRIES[id];
}

export function createStrategy(id: string, context: StrategyContext): MapStrategy {
  return getStrategyEntry(id).create(context);
}

/**
 * Ids and display names of every registered strategy
 */
export function getAvailableStrategies(): { id: StrategyId; name: string }[] {
  return STRATEGIES.map(({ id, name }) => ({ id, name }));
}
