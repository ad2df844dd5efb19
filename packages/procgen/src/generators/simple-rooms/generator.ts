/**
 * Simple Rooms Generator
 *
 * Scatters non-overlapping walled rooms and joins each one to the room
 * placed before it with an L-shaped tunnel.
 */

import { DungeonError, TileKind } from "@descent/contracts";
import { Rect } from "../../core/geometry/rect";
import {
  carveHorizontalTunnel,
  carveVerticalTunnel,
  carveWalledRoom,
} from "../../passes/carving/room-carvers";
import { RoomMapStrategy, type StrategyContext } from "../base/map-strategy";
import { MAX_ROOM_ATTEMPTS, MAX_ROOM_SIZE, MIN_ROOM_SIZE } from "./constants";

export class SimpleRoomsGenerator extends RoomMapStrategy {
  readonly id = "simple-rooms";
  readonly name = "Simple Rooms";

  constructor(context: StrategyContext) {
    super(context, TileKind.VOID);
  }

  protected generate(): void {
    const { width, height } = this.grid;

    for (let attempt = 0; attempt < MAX_ROOM_ATTEMPTS; attempt++) {
      const w = this.rng.range(MIN_ROOM_SIZE, MAX_ROOM_SIZE);
      const h = this.rng.range(MIN_ROOM_SIZE, MAX_ROOM_SIZE);
      const x = this.rng.rollDice(1, width - w - 1) - 1;
      const y = this.rng.rollDice(1, height - h - 1) - 1;
      const candidate = new Rect(x, y, w, h);

      if (this.rooms.some((room) => candidate.intersects(room))) continue;

      carveWalledRoom(this.grid, candidate);
      this.rooms.push(candidate);
      this.takeSnapshot();
    }

    if (this.rooms.length < 2) {
      throw new DungeonError("NO_ROOMS_PLACED", "Fewer than two rooms fit in the level", {
        rooms: this.rooms.length,
        attempts: MAX_ROOM_ATTEMPTS,
      });
    }

    for (let i = 1; i < this.rooms.length; i++) {
      const prev = this.rooms[i - 1].center();
      const next = this.rooms[i].center();

      if (this.rng.range(0, 1) === 1) {
        carveHorizontalTunnel(this.grid, prev.x, next.x, prev.y);
        carveVerticalTunnel(this.grid, prev.y, next.y, next.x);
      } else {
        carveVerticalTunnel(this.grid, prev.y, next.y, prev.x);
        carveHorizontalTunnel(this.grid, prev.x, next.x, next.y);
      }
      this.takeSnapshot();
    }

    this.finishRooms(this.rooms[0].center(), this.rooms[this.rooms.length - 1].center());
  }
}
