/**
 * Voronoi Generator
 *
 * Scatters seed points, gives every tile to its nearest seed and keeps
 * the cell interiors as floor; the borders between cells become walls.
 */

import { TileKind } from "@descent/contracts";
import type { Point } from "../../core/geometry/types";
import { findStartWalkingLeft } from "../../passes/connectivity/reachability";
import { BaseMapStrategy, type StrategyContext } from "../base/map-strategy";
import type { StrategyId } from "../strategy-ids";

export type DistanceMetric = "pythagoras" | "manhattan" | "chebyshev";

/** Number of distinct seed points */
export const VORONOI_SEED_COUNT = 64;

/**
 * Distance used to rank seeds. Pythagoras compares squared lengths,
 * which orders seeds the same way as the true length.
 */
export function seedDistance(metric: DistanceMetric, a: Point, b: Point): number {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  switch (metric) {
    case "pythagoras":
      return dx * dx + dy * dy;
    case "manhattan":
      return dx + dy;
    case "chebyshev":
      return Math.max(dx, dy);
  }
}

export class VoronoiGenerator extends BaseMapStrategy {
  constructor(
    context: StrategyContext,
    readonly id: StrategyId,
    readonly name: string,
    private readonly metric: DistanceMetric,
    private readonly seedCount: number = VORONOI_SEED_COUNT,
  ) {
    super(context);
  }

  protected generate(): void {
    const membership = this.assignMembership(this.scatterSeeds());
    const { width, height } = this.grid;

    for (let y = 1; y < height - 1; y++) {
      for (let x = 1; x < width - 1; x++) {
        const own = membership[this.grid.index(x, y)];
        let foreign = 0;
        if (membership[this.grid.index(x - 1, y)] !== own) foreign++;
        if (membership[this.grid.index(x + 1, y)] !== own) foreign++;
        if (membership[this.grid.index(x, y - 1)] !== own) foreign++;
        if (membership[this.grid.index(x, y + 1)] !== own) foreign++;

        if (foreign < 2) this.grid.set(x, y, TileKind.FLOOR);
      }
    }
    this.takeSnapshot();

    this.finishWithPruning(findStartWalkingLeft(this.grid));
  }

  private scatterSeeds(): Point[] {
    const { width, height } = this.grid;
    const seeds: Point[] = [];
    const taken = new Set<number>();

    while (seeds.length < this.seedCount) {
      const x = this.rng.rollDice(1, width - 1);
      const y = this.rng.rollDice(1, height - 1);
      const index = this.grid.index(x, y);
      if (!taken.has(index)) {
        taken.add(index);
        seeds.push({ x, y });
      }
    }
    return seeds;
  }

  /**
   * Index of the nearest seed for every tile; the lowest seed index
   * wins ties.
   */
  private assignMembership(seeds: readonly Point[]): Int32Array {
    const membership = new Int32Array(this.grid.size);

    for (let i = 0; i < membership.length; i++) {
      const tile = this.grid.toPoint(i);
      let best = 0;
      let bestDistance = Infinity;
      seeds.forEach((seed, index) => {
        const distance = seedDistance(this.metric, tile, seed);
        if (distance < bestDistance) {
          bestDistance = distance;
          best = index;
        }
      });
      membership[i] = best;
    }
    return membership;
  }
}
