/**
 * Reachability Pass
 *
 * Removes floor the player could never walk to and picks the exit as
 * the reachable floor tile furthest from the start.
 */

import { DungeonError, TileKind } from "@descent/contracts";
import { MAX_PRUNE_COST } from "../../core/constants";
import { DIRECTIONS_8, type Point } from "../../core/geometry/types";
import type { Grid } from "../../core/grid/grid";
import { DijkstraMap } from "../../core/pathfinding/dijkstra-map";

/**
 * Convert every floor tile the start cannot reach within `maxCost` into
 * wall, then return the index of the furthest remaining floor tile.
 *
 * Pruning by a capped distance keeps the remaining floor connected:
 * every tile on a cheapest path is itself within the cap.
 *
 * @throws DungeonError NO_REACHABLE_EXIT when no floor tile other than
 * the start is reachable.
 */
export function pruneAndFindExit(
  grid: Grid,
  startIndex: number,
  maxCost: number = MAX_PRUNE_COST,
): number {
  grid.populateBlocked();
  const distances = DijkstraMap.compute(grid, [startIndex], maxCost);

  for (let i = 0; i < grid.size; i++) {
    if (grid.getAt(i) === TileKind.FLOOR && !distances.isReachable(i)) {
      grid.setAt(i, TileKind.WALL);
    }
  }

  const exit = distances.findFurthest(
    (i) => i !== startIndex && grid.getAt(i) === TileKind.FLOOR,
  );
  if (exit === null) {
    throw new DungeonError(
      "NO_REACHABLE_EXIT",
      "No floor tile is reachable from the start",
      { start: grid.toPoint(startIndex) },
    );
  }

  grid.populateBlocked();
  return exit.index;
}

/**
 * Step left from the grid centre until a floor tile is found.
 *
 * @throws DungeonError START_NOT_FOUND when the walk reaches the left edge.
 */
export function findStartWalkingLeft(grid: Grid): Point {
  const { x: cx, y } = grid.center();
  for (let x = cx; x > 0; x--) {
    if (grid.get(x, y) === TileKind.FLOOR) {
      return { x, y };
    }
  }
  throw new DungeonError(
    "START_NOT_FOUND",
    "No floor tile left of the level centre",
    { center: { x: cx, y } },
  );
}

/**
 * Uncapped 8-directional flood fill over every tile that is not wall or
 * void. Returns the reached tile indices.
 */
export function floodReachable(grid: Grid, start: Point): Set<number> {
  const reached = new Set<number>();
  if (grid.isVoidOrWall(start.x, start.y)) return reached;

  const stack = [grid.index(start.x, start.y)];
  reached.add(stack[0]);

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    const { x, y } = grid.toPoint(current);

    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (!grid.isInBounds(nx, ny) || grid.isVoidOrWall(nx, ny)) continue;
      const next = grid.index(nx, ny);
      if (reached.has(next)) continue;
      reached.add(next);
      stack.push(next);
    }
  }

  return reached;
}

/**
 * Floor and stairs tiles the start cannot reach, ascending by index.
 */
export function findUnreachableFloor(grid: Grid, start: Point): number[] {
  const reached = floodReachable(grid, start);
  const unreachable: number[] = [];
  for (let i = 0; i < grid.size; i++) {
    const kind = grid.getAt(i);
    if ((kind === TileKind.FLOOR || kind === TileKind.STAIRS_DOWN) && !reached.has(i)) {
      unreachable.push(i);
    }
  }
  return unreachable;
}
