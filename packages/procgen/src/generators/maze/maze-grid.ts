import type { RandomSource } from "@descent/contracts";

export const TOP = 0;
export const RIGHT = 1;
export const BOTTOM = 2;
export const LEFT = 3;

export type WallFlags = [boolean, boolean, boolean, boolean];

export interface MazeCell {
  readonly row: number;
  readonly column: number;
  /** Indexed by TOP, RIGHT, BOTTOM, LEFT; true while the wall stands */
  readonly walls: WallFlags;
  visited: boolean;
}

/**
 * Cell lattice for the growing-tree carver. Every cell starts with all
 * four walls.
 */
export class MazeGrid {
  readonly cells: MazeCell[] = [];

  constructor(
    readonly columns: number,
    readonly rows: number,
  ) {
    for (let row = 0; row < rows; row++) {
      for (let column = 0; column < columns; column++) {
        this.cells.push({ row, column, walls: [true, true, true, true], visited: false });
      }
    }
  }

  indexOf(row: number, column: number): number {
    if (row < 0 || column < 0 || column >= this.columns || row >= this.rows) return -1;
    return column + row * this.columns;
  }

  /**
   * Carve a perfect maze starting from cell 0.
   *
   * Unvisited neighbours are considered in top, right, bottom, left
   * order. A dead end resumes from the oldest cell of the trail rather
   * than the newest, which gives long straight-ish corridors.
   *
   * @param onStep - called after every step, e.g. for snapshots
   */
  carve(rng: RandomSource, onStep?: (step: number) => void): void {
    const trail: number[] = [];
    let current = 0;
    let step = 0;

    while (true) {
      this.cells[current].visited = true;
      const next = this.pickNeighbour(current, rng);

      if (next !== undefined) {
        this.cells[next].visited = true;
        trail.push(current);
        this.removeWallsBetween(current, next);
        current = next;
      } else {
        const resume = trail.shift();
        if (resume === undefined) break;
        current = resume;
      }

      onStep?.(step++);
    }
  }

  private pickNeighbour(index: number, rng: RandomSource): number | undefined {
    const { row, column } = this.cells[index];
    const candidates = [
      this.indexOf(row - 1, column),
      this.indexOf(row, column + 1),
      this.indexOf(row + 1, column),
      this.indexOf(row, column - 1),
    ].filter((i) => i !== -1 && !this.cells[i].visited);

    if (candidates.length <= 1) return candidates[0];
    return candidates[rng.rollDice(1, candidates.length) - 1];
  }

  private removeWallsBetween(a: number, b: number): void {
    const from = this.cells[a];
    const to = this.cells[b];
    const dx = from.column - to.column;
    const dy = from.row - to.row;

    if (dx === 1) {
      from.walls[LEFT] = false;
      to.walls[RIGHT] = false;
    } else if (dx === -1) {
      from.walls[RIGHT] = false;
      to.walls[LEFT] = false;
    } else if (dy === 1) {
      from.walls[TOP] = false;
      to.walls[BOTTOM] = false;
    } else if (dy === -1) {
      from.walls[BOTTOM] = false;
      to.walls[TOP] = false;
    }
  }
}
