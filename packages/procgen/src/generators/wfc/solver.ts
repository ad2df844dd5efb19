/**
 * Wave Function Collapse solver.
 *
 * Fills a grid of chunk slots one at a time, always preferring the open
 * slot with the most decided neighbours, and stamps each chosen pattern
 * onto the tile grid.
 */

import { DungeonError, type RandomSource, TileKind } from "@descent/contracts";
import type { Grid } from "../../core/grid/grid";
import { Side } from "./constants";
import type { MapChunk } from "./patterns";

interface OpenSlot {
  readonly index: number;
  neighbours: number;
}

export class WfcSolver {
  /** Chosen pattern per slot, null while undecided */
  readonly chunks: (number | null)[];
  readonly chunksX: number;
  readonly chunksY: number;
  /** False once some slot had no pattern left to choose from */
  possible = true;

  private remaining: OpenSlot[];

  constructor(
    private readonly constraints: readonly MapChunk[],
    private readonly chunkSize: number,
    grid: Grid,
  ) {
    this.chunksX = Math.trunc(grid.width / chunkSize);
    this.chunksY = Math.trunc(grid.height / chunkSize);
    const total = this.chunksX * this.chunksY;

    this.chunks = new Array<number | null>(total).fill(null);
    this.remaining = Array.from({ length: total }, (_, index) => ({ index, neighbours: 0 }));
  }

  private chunkIndex(cx: number, cy: number): number {
    return cy * this.chunksX + cx;
  }

  private decidedAt(cx: number, cy: number): number | null {
    if (cx < 0 || cy < 0 || cx >= this.chunksX || cy >= this.chunksY) return null;
    return this.chunks[this.chunkIndex(cx, cy)];
  }

  private countNeighbours(cx: number, cy: number): number {
    let count = 0;
    if (this.decidedAt(cx - 1, cy) !== null) count++;
    if (this.decidedAt(cx + 1, cy) !== null) count++;
    if (this.decidedAt(cx, cy - 1) !== null) count++;
    if (this.decidedAt(cx, cy + 1) !== null) count++;
    return count;
  }

  /**
   * Decide one slot. Returns true when the run is over, either because
   * every slot is filled or because a contradiction was hit; check
   * `possible` to tell which.
   */
  iteration(grid: Grid, rng: RandomSource): boolean {
    if (this.remaining.length === 0) return true;

    let anyNeighbours = false;
    for (const slot of this.remaining) {
      const cx = slot.index % this.chunksX;
      slot.neighbours = this.countNeighbours(cx, Math.trunc(slot.index / this.chunksX));
      if (slot.neighbours > 0) anyNeighbours = true;
    }
    // Array#sort is stable, so equal counts keep their order
    this.remaining.sort((a, b) => b.neighbours - a.neighbours);

    const position = anyNeighbours ? 0 : rng.rollDice(1, this.remaining.length) - 1;
    const [slot] = this.remaining.splice(position, 1);
    const cx = slot.index % this.chunksX;
    const cy = Math.trunc(slot.index / this.chunksX);

    const options = this.collectOptions(cx, cy);
    let pattern: number;

    if (options.length === 0) {
      pattern = rng.rollDice(1, this.constraints.length) - 1;
    } else {
      const candidates = intersectAll(options);
      if (candidates.length === 0) {
        this.possible = false;
        return true;
      }
      pattern =
        candidates.length === 1
          ? candidates[0]
          : candidates[rng.rollDice(1, candidates.length) - 1];
    }

    this.chunks[slot.index] = pattern;
    this.stamp(grid, cx, cy, pattern);

    return this.remaining.length === 0;
  }

  /**
   * For each decided neighbour, the patterns it allows on its side
   * facing this slot.
   */
  private collectOptions(cx: number, cy: number): (readonly number[])[] {
    const options: (readonly number[])[] = [];
    const west = this.decidedAt(cx - 1, cy);
    const east = this.decidedAt(cx + 1, cy);
    const north = this.decidedAt(cx, cy - 1);
    const south = this.decidedAt(cx, cy + 1);

    if (west !== null) options.push(this.constraints[west].compatibleWith[Side.EAST]);
    if (east !== null) options.push(this.constraints[east].compatibleWith[Side.WEST]);
    if (north !== null) options.push(this.constraints[north].compatibleWith[Side.SOUTH]);
    if (south !== null) options.push(this.constraints[south].compatibleWith[Side.NORTH]);
    return options;
  }

  private stamp(grid: Grid, cx: number, cy: number, patternIndex: number): void {
    const { pattern } = this.constraints[patternIndex];
    const left = cx * this.chunkSize;
    const top = cy * this.chunkSize;

    for (let y = 0; y < this.chunkSize; y++) {
      for (let x = 0; x < this.chunkSize; x++) {
        grid.set(left + x, top + y, pattern[y * this.chunkSize + x]);
      }
    }
  }
}

/**
 * Members of the first list present in every other list, in first-list
 * order.
 */
export function intersectAll(lists: readonly (readonly number[])[]): number[] {
  if (lists.length === 0) return [];
  const [first, ...rest] = lists;
  const others = rest.map((list) => new Set(list));
  return first.filter((value) => others.every((set) => set.has(value)));
}

/**
 * Run fresh solvers until one completes without contradiction. The grid
 * is reset to wall before every attempt and holds the result on return.
 *
 * @throws DungeonError SOLVER_RETRIES_EXHAUSTED when every attempt fails
 */
export function solveChunks(
  constraints: readonly MapChunk[],
  chunkSize: number,
  grid: Grid,
  rng: RandomSource,
  maxAttempts: number,
  onIteration?: () => void,
): WfcSolver {
  if (constraints.length === 0) {
    throw new DungeonError("SOLVER_RETRIES_EXHAUSTED", "No patterns to solve with", {
      attempts: 0,
    });
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    grid.fill(TileKind.WALL);
    const solver = new WfcSolver(constraints, chunkSize, grid);

    while (!solver.iteration(grid, rng)) {
      onIteration?.();
    }
    onIteration?.();

    if (solver.possible) return solver;
  }

  throw new DungeonError(
    "SOLVER_RETRIES_EXHAUSTED",
    `No solution found in ${maxAttempts} attempts`,
    { attempts: maxAttempts, patterns: constraints.length },
  );
}
