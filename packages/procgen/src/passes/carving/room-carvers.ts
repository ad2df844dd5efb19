/**
 * Room and tunnel carving shared by the room-based strategies.
 */

import { TileKind } from "@descent/contracts";
import type { Rect } from "../../core/geometry/rect";
import type { Grid } from "../../core/grid/grid";

/**
 * Carve a walled room. The wall ring runs along x1, x2 + 1, y1 and
 * y2 + 1; everything inside becomes floor.
 */
export function carveWalledRoom(grid: Grid, room: Rect): void {
  const top = room.y1;
  const bottom = room.y2 + 1;
  const left = room.x1;
  const right = room.x2 + 1;

  for (let y = top; y <= bottom; y++) {
    for (let x = left; x <= right; x++) {
      if (!grid.isInBounds(x, y)) continue;
      const onEdge = x === left || x === right || y === top || y === bottom;
      grid.set(x, y, onEdge ? TileKind.WALL : TileKind.FLOOR);
    }
  }
}

/**
 * Carve every tile of x1..x2-1, y1..y2-1 as floor (no wall ring).
 */
export function carveOpenRoom(grid: Grid, room: Rect): void {
  grid.fillRect(room.x1, room.y1, room.x2 - 1, room.y2 - 1, TileKind.FLOOR);
}

/**
 * Three-tile-high horizontal tunnel along row `y`: the middle row is
 * floor and the rows above and below are wall. Existing floor is never
 * overwritten.
 */
export function carveHorizontalTunnel(grid: Grid, x1: number, x2: number, y: number): void {
  const left = Math.min(x1, x2);
  const right = Math.max(x1, x2);

  for (let row = y - 1; row <= y + 1; row++) {
    for (let x = left; x <= right; x++) {
      if (!grid.isInBounds(x, row) || grid.get(x, row) === TileKind.FLOOR) continue;
      grid.set(x, row, row === y ? TileKind.FLOOR : TileKind.WALL);
    }
  }
}

/**
 * Vertical counterpart of {@link carveHorizontalTunnel} along column `x`.
 */
export function carveVerticalTunnel(grid: Grid, y1: number, y2: number, x: number): void {
  const top = Math.min(y1, y2);
  const bottom = Math.max(y1, y2);

  for (let column = x - 1; column <= x + 1; column++) {
    for (let y = top; y <= bottom; y++) {
      if (!grid.isInBounds(column, y) || grid.get(column, y) === TileKind.FLOOR) continue;
      grid.set(column, y, column === x ? TileKind.FLOOR : TileKind.WALL);
    }
  }
}

/**
 * Walk from (x1, y1) to (x2, y2), x first, carving floor and walling
 * every non-floor 8-neighbour of each step. The starting tile itself is
 * left untouched.
 */
export function carveWalledCorridor(
  grid: Grid,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): void {
  let x = x1;
  let y = y1;

  while (x !== x2 || y !== y2) {
    if (x < x2) x++;
    else if (x > x2) x--;
    else if (y < y2) y++;
    else y--;

    grid.set(x, y, TileKind.FLOOR);

    for (let ny = y - 1; ny <= y + 1; ny++) {
      for (let nx = x - 1; nx <= x + 1; nx++) {
        if ((nx === x && ny === y) || !grid.isInBounds(nx, ny)) continue;
        if (grid.get(nx, ny) !== TileKind.FLOOR) {
          grid.set(nx, ny, TileKind.WALL);
        }
      }
    }
  }
}
