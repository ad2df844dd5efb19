/**
 * Region Spawner
 *
 * Chooses spawn tiles inside a region or room and asks the spawn sink
 * to create an entity on each.
 */

import {
  type RandomSource,
  type SpawnSink,
  TileKind,
} from "@descent/contracts";
import type { Rect } from "../../core/geometry/rect";
import type { Grid } from "../../core/grid/grid";
import { RandomTable, roomTable } from "./spawn-table";

/** Base number of spawns an area may receive at depth 1 */
export const MAX_SPAWNS_PER_AREA = 4;

export interface SpawnPlacement {
  readonly index: number;
  readonly kind: string;
}

/**
 * Pick spawn tiles from `area` without repeats.
 *
 * The count is `1d(MAX + 3) + depth - 4`, capped by the area size; a
 * count of zero or less places nothing.
 */
export function planRegionSpawns(
  area: readonly number[],
  depth: number,
  rng: RandomSource,
  table: RandomTable = roomTable(depth),
): SpawnPlacement[] {
  const candidates = [...area];
  const count = Math.min(
    candidates.length,
    rng.rollDice(1, MAX_SPAWNS_PER_AREA + 3) + (depth - 1) - 3,
  );

  const placements: SpawnPlacement[] = [];
  for (let i = 0; i < count; i++) {
    const pick = candidates.length === 1 ? 0 : rng.rollDice(1, candidates.length) - 1;
    const [index] = candidates.splice(pick, 1);
    const kind = table.roll(rng);
    if (index !== undefined && kind !== undefined) {
      placements.push({ index, kind });
    }
  }
  return placements;
}

/**
 * Spawn into a region of tile indices.
 */
export function spawnRegion(
  grid: Grid,
  area: readonly number[],
  rng: RandomSource,
  sink: SpawnSink,
): SpawnPlacement[] {
  const placements = planRegionSpawns(area, grid.depth, rng);
  for (const { index, kind } of placements) {
    const { x, y } = grid.toPoint(index);
    sink.spawn(kind, x, y);
  }
  return placements;
}

/**
 * Spawn into the floor tiles strictly inside a room's bounds.
 */
export function spawnRoom(
  grid: Grid,
  room: Rect,
  rng: RandomSource,
  sink: SpawnSink,
): SpawnPlacement[] {
  const area: number[] = [];
  for (let y = room.y1 + 1; y < room.y2; y++) {
    for (let x = room.x1 + 1; x < room.x2; x++) {
      if (grid.get(x, y) === TileKind.FLOOR) {
        area.push(grid.index(x, y));
      }
    }
  }
  return spawnRegion(grid, area, rng, sink);
}
