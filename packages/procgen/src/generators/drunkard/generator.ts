/**
 * Drunkard's Walk Generator
 *
 * Releases short-lived random walkers that dig through solid rock until
 * enough of the level is open.
 */

import { TileKind } from "@descent/contracts";
import type { Point } from "../../core/geometry/types";
import { BaseMapStrategy, type StrategyContext } from "../base/map-strategy";
import type { StrategyId } from "../strategy-ids";
import { randomWalkerOrigin, stagger } from "../walker";
import type { DrunkardSettings } from "./constants";

export class DrunkardWalkGenerator extends BaseMapStrategy {
  constructor(
    context: StrategyContext,
    readonly id: StrategyId,
    readonly name: string,
    private readonly settings: DrunkardSettings,
  ) {
    super(context);
  }

  protected generate(): void {
    const { width, height } = this.grid;
    const start = this.grid.center();
    this.grid.set(start.x, start.y, TileKind.FLOOR);

    const desired = Math.trunc(this.settings.floorPercent * width * height);
    let floor = this.grid.count(TileKind.FLOOR);
    let walkers = 0;

    while (floor < desired) {
      this.checkLimit("drunkard walkers", walkers + 1, this.context.limits.maxWalkers);

      const origin =
        this.settings.spawnMode === "random" && walkers > 0
          ? randomWalkerOrigin(width, height, this.rng)
          : start;
      const dug = this.walk(origin);
      this.takeSnapshot();
      for (const index of dug) this.grid.setAt(index, TileKind.FLOOR);

      walkers++;
      floor += dug.length;
    }

    this.logger.debug({ strategy: this.id, walkers, floor }, "Walkers finished");
    this.finishWithPruning(start);
  }

  /**
   * Dig along one walker's path. Freshly dug tiles are marked as
   * placeholders until the walker is done; returns their indices.
   */
  private walk(origin: Point): number[] {
    const dug: number[] = [];
    let position = origin;
    for (let life = this.settings.lifetime; life > 0; life--) {
      if (this.grid.get(position.x, position.y) === TileKind.WALL) {
        this.grid.set(position.x, position.y, TileKind.PLACEHOLDER);
        dug.push(this.grid.index(position.x, position.y));
      }
      position = stagger(position, this.grid.width, this.grid.height, this.rng);
    }
    return dug;
  }
}
