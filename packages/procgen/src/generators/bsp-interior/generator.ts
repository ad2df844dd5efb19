/**
 * BSP Interior Generator
 *
 * Splits the whole level in two, again and again, until the pieces are
 * small; every piece becomes a room separated from its neighbours by a
 * one tile wall. Rooms are chained in split order.
 */

import { DungeonError } from "@descent/contracts";
import { Rect } from "../../core/geometry/rect";
import type { Point } from "../../core/geometry/types";
import { carveOpenRoom, carveWalledCorridor } from "../../passes/carving/room-carvers";
import { RoomMapStrategy } from "../base/map-strategy";

/** A half must be wider (or taller) than this to be split again */
export const MIN_SPLIT_SIZE = 8;

export class BspInteriorGenerator extends RoomMapStrategy {
  readonly id = "bsp-interior";
  readonly name = "BSP Interior";

  private readonly leaves: Rect[] = [];

  protected generate(): void {
    const { width, height } = this.grid;
    const whole = new Rect(1, 1, width - 2, height - 2);
    this.leaves.push(whole);
    this.split(whole);

    for (const leaf of this.leaves) {
      this.rooms.push(leaf);
      carveOpenRoom(this.grid, leaf);
      this.takeSnapshot();
    }

    if (this.rooms.length < 2) {
      throw new DungeonError("NO_ROOMS_PLACED", "The level was not split", {
        rooms: this.rooms.length,
      });
    }

    for (let i = 0; i < this.rooms.length - 1; i++) {
      const from = this.randomTile(this.rooms[i]);
      const to = this.randomTile(this.rooms[i + 1]);
      carveWalledCorridor(this.grid, from.x, from.y, to.x, to.y);
      this.takeSnapshot();
    }

    this.finishRooms(this.rooms[0].center(), this.rooms[this.rooms.length - 1].center());
  }

  /**
   * Replace the most recent leaf with its two halves, recursing while
   * the halves stay large. A d4 roll of 1-2 splits the width.
   */
  private split(rect: Rect): void {
    this.leaves.pop();

    const { width, height } = rect;
    const halfWidth = Math.trunc(width / 2);
    const halfHeight = Math.trunc(height / 2);

    if (this.rng.rollDice(1, 4) <= 2) {
      const left = new Rect(rect.x1, rect.y1, halfWidth - 1, height);
      this.leaves.push(left);
      if (halfWidth > MIN_SPLIT_SIZE) this.split(left);

      const right = new Rect(rect.x1 + halfWidth, rect.y1, halfWidth, height);
      this.leaves.push(right);
      if (halfWidth > MIN_SPLIT_SIZE) this.split(right);
    } else {
      const top = new Rect(rect.x1, rect.y1, width, halfHeight - 1);
      this.leaves.push(top);
      if (halfHeight > MIN_SPLIT_SIZE) this.split(top);

      const bottom = new Rect(rect.x1, rect.y1 + halfHeight, width, halfHeight);
      this.leaves.push(bottom);
      if (halfHeight > MIN_SPLIT_SIZE) this.split(bottom);
    }
  }

  /**
   * Random tile of an open room (x1..x2-1, y1..y2-1)
   */
  private randomTile(room: Rect): Point {
    return {
      x: room.x1 + this.rng.rollDice(1, room.width) - 1,
      y: room.y1 + this.rng.rollDice(1, room.height) - 1,
    };
  }
}
