/**
 * Diffusion-Limited Aggregation Generator
 *
 * Grows a blob from the centre of the level: each walker wanders until
 * it touches the blob and paints floor where it stopped.
 */

import { TileKind } from "@descent/contracts";
import { bresenhamLine } from "../../core/geometry/line";
import type { Point } from "../../core/geometry/types";
import { paint } from "../../passes/carving/paint";
import { BaseMapStrategy, type StrategyContext } from "../base/map-strategy";
import type { StrategyId } from "../strategy-ids";
import { randomWalkerOrigin, stagger } from "../walker";
import type { DlaSettings } from "./constants";

/** Walkers between two snapshots */
const SNAPSHOT_INTERVAL = 50;

export class DlaGenerator extends BaseMapStrategy {
  constructor(
    context: StrategyContext,
    readonly id: StrategyId,
    readonly name: string,
    private readonly settings: DlaSettings,
  ) {
    super(context);
  }

  protected generate(): void {
    const { width, height } = this.grid;
    const start = this.grid.center();

    this.grid.set(start.x, start.y, TileKind.FLOOR);
    this.grid.set(start.x - 1, start.y, TileKind.FLOOR);
    this.grid.set(start.x + 1, start.y, TileKind.FLOOR);
    this.grid.set(start.x, start.y - 1, TileKind.FLOOR);
    this.grid.set(start.x, start.y + 1, TileKind.FLOOR);
    this.takeSnapshot();

    const desired = Math.trunc(this.settings.floorPercent * width * height);
    let floor = this.grid.count(TileKind.FLOOR);
    let walkers = 0;

    while (floor < desired) {
      this.checkLimit("DLA walkers", walkers + 1, this.context.limits.maxWalkers);

      const target = this.runWalker(start);
      floor += paint(this.grid, this.settings.symmetry, this.settings.brushSize, target.x, target.y);

      walkers++;
      if (walkers % SNAPSHOT_INTERVAL === 0) this.takeSnapshot();
    }

    this.logger.debug({ strategy: this.id, walkers, floor }, "Aggregation finished");
    this.finishWithPruning(start);
  }

  /**
   * Move one walker and return the tile to paint.
   */
  private runWalker(start: Point): Point {
    switch (this.settings.algorithm) {
      case "walk-inwards":
        return this.walkInwards();
      case "walk-outwards":
        return this.walkOutwards(start);
      case "central-attractor":
        return this.followAttractor(start);
    }
  }

  /**
   * From a random point, wander while on wall; paint the last wall tile
   * before the walker reached floor.
   */
  private walkInwards(): Point {
    const { width, height } = this.grid;
    let digger = randomWalkerOrigin(width, height, this.rng);
    let previous = digger;
    let steps = 0;

    while (this.grid.get(digger.x, digger.y) === TileKind.WALL) {
      this.checkLimit("DLA walker steps", ++steps, this.context.limits.maxWalkerSteps);
      previous = digger;
      digger = stagger(digger, width, height, this.rng);
    }
    return previous;
  }

  /**
   * From the start, wander while on floor; paint the first rock tile.
   */
  private walkOutwards(start: Point): Point {
    const { width, height } = this.grid;
    let digger = start;
    let steps = 0;

    while (this.grid.get(digger.x, digger.y) === TileKind.FLOOR) {
      this.checkLimit("DLA walker steps", ++steps, this.context.limits.maxWalkerSteps);
      digger = stagger(digger, width, height, this.rng);
    }
    return digger;
  }

  /**
   * From a random point, follow a straight line towards the start while
   * on wall; paint the last wall tile.
   */
  private followAttractor(start: Point): Point {
    let digger = randomWalkerOrigin(this.grid.width, this.grid.height, this.rng);
    let previous = digger;
    const path = bresenhamLine(digger, start).slice(1);

    for (const next of path) {
      if (this.grid.get(digger.x, digger.y) !== TileKind.WALL) break;
      previous = digger;
      digger = next;
    }
    return previous;
  }
}
