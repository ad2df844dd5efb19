/**
 * Maze Generator
 *
 * Carves a perfect maze on a half-resolution lattice: cell (c, r) sits
 * on tile (2c + 2, 2r + 2) and an open wall floors the tile between two
 * cells.
 */

import { TileKind } from "@descent/contracts";
import type { Grid } from "../../core/grid/grid";
import { BaseMapStrategy } from "../base/map-strategy";
import { BOTTOM, LEFT, MazeGrid, RIGHT, TOP } from "./maze-grid";

/** Steps between two snapshots while carving */
const SNAPSHOT_INTERVAL = 50;

export class MazeGenerator extends BaseMapStrategy {
  readonly id = "maze";
  readonly name = "Maze";

  protected generate(): void {
    const maze = new MazeGrid(
      Math.trunc(this.grid.width / 2) - 2,
      Math.trunc(this.grid.height / 2) - 2,
    );

    maze.carve(this.rng, (step) => {
      if (this.context.onSnapshot && step % SNAPSHOT_INTERVAL === 0) {
        copyMazeToGrid(maze, this.grid);
        this.takeSnapshot();
      }
    });
    copyMazeToGrid(maze, this.grid);

    this.finishWithPruning({ x: 2, y: 2 });
  }
}

/**
 * Overwrite `grid` with the maze: wall everywhere, floor on cells and
 * on the openings between them.
 */
export function copyMazeToGrid(maze: MazeGrid, grid: Grid): void {
  grid.fill(TileKind.WALL);

  for (const cell of maze.cells) {
    const x = (cell.column + 1) * 2;
    const y = (cell.row + 1) * 2;
    grid.set(x, y, TileKind.FLOOR);
    if (!cell.walls[TOP]) grid.set(x, y - 1, TileKind.FLOOR);
    if (!cell.walls[RIGHT]) grid.set(x + 1, y, TileKind.FLOOR);
    if (!cell.walls[BOTTOM]) grid.set(x, y + 1, TileKind.FLOOR);
    if (!cell.walls[LEFT]) grid.set(x - 1, y, TileKind.FLOOR);
  }
}
