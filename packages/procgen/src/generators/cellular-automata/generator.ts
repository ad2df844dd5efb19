/**
 * Cellular Automata Generator
 *
 * Random noise smoothed into caves: a tile turns to wall when it is
 * crowded by walls or completely isolated from them.
 */

import { TileKind } from "@descent/contracts";
import { findStartWalkingLeft } from "../../passes/connectivity/reachability";
import { BaseMapStrategy } from "../base/map-strategy";
import {
  FLOOR_ROLL_THRESHOLD,
  SMOOTHING_PASSES,
  WALL_NEIGHBOUR_LIMIT,
} from "./constants";

export class CellularAutomataGenerator extends BaseMapStrategy {
  readonly id = "cellular-automata";
  readonly name = "Cellular Automata";

  protected generate(): void {
    const { width, height } = this.grid;

    for (let y = 1; y < height - 1; y++) {
      for (let x = 1; x < width - 1; x++) {
        const roll = this.rng.rollDice(1, 100);
        this.grid.set(x, y, roll > FLOOR_ROLL_THRESHOLD ? TileKind.FLOOR : TileKind.WALL);
      }
    }
    this.takeSnapshot();

    for (let pass = 0; pass < SMOOTHING_PASSES; pass++) {
      this.smooth();
      this.takeSnapshot();
    }

    this.finishWithPruning(findStartWalkingLeft(this.grid));
  }

  /**
   * One synchronous pass: every interior tile is decided from the
   * previous generation.
   */
  private smooth(): void {
    const { width, height } = this.grid;
    const previous = this.grid.clone();

    for (let y = 1; y < height - 1; y++) {
      for (let x = 1; x < width - 1; x++) {
        const walls = previous.countNeighbors8(x, y, TileKind.WALL);
        const becomesWall = walls > WALL_NEIGHBOUR_LIMIT || walls === 0;
        this.grid.set(x, y, becomesWall ? TileKind.WALL : TileKind.FLOOR);
      }
    }
  }
}
