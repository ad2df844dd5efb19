/**
 * BSP Dungeon Generator
 *
 * Repeatedly splits the level into quadrants and drops a room into a
 * random partition when the space around it is still untouched. Rooms
 * are then chained left to right with walled corridors.
 */

import { DungeonError, TileKind } from "@descent/contracts";
import { Rect } from "../../core/geometry/rect";
import type { Point } from "../../core/geometry/types";
import { carveWalledCorridor, carveWalledRoom } from "../../passes/carving/room-carvers";
import { RoomMapStrategy, type StrategyContext } from "../base/map-strategy";
import {
  LEVEL_MARGIN,
  MAX_PLACEMENT_ATTEMPTS,
  MAX_ROOM_ROLL,
  MIN_ROOM_ROLL,
  ROOM_OFFSET_SIDES,
} from "./constants";

export class BspDungeonGenerator extends RoomMapStrategy {
  readonly id = "bsp-dungeon";
  readonly name = "BSP Dungeon";

  private readonly partitions: Rect[] = [];

  constructor(context: StrategyContext) {
    super(context, TileKind.VOID);
  }

  protected generate(): void {
    const { width, height } = this.grid;
    const first = new Rect(
      LEVEL_MARGIN,
      LEVEL_MARGIN,
      width - LEVEL_MARGIN * 2 - 1,
      height - LEVEL_MARGIN * 2 - 1,
    );
    this.partitions.push(first);
    this.splitIntoQuadrants(first);

    for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS; attempt++) {
      const partition = this.randomPartition();
      const candidate = this.randomRoomWithin(partition);

      if (this.hasSpaceFor(candidate)) {
        carveWalledRoom(this.grid, candidate);
        this.rooms.push(candidate);
        this.splitIntoQuadrants(partition);
        this.takeSnapshot();
      }
    }

    if (this.rooms.length < 2) {
      throw new DungeonError("NO_ROOMS_PLACED", "Fewer than two rooms fit in the level", {
        rooms: this.rooms.length,
        attempts: MAX_PLACEMENT_ATTEMPTS,
      });
    }

    this.rooms.sort((a, b) => a.x1 - b.x1);

    for (let i = 0; i < this.rooms.length - 1; i++) {
      const from = this.randomFloorTile(this.rooms[i]);
      const to = this.randomFloorTile(this.rooms[i + 1]);
      carveWalledCorridor(this.grid, from.x, from.y, to.x, to.y);
      this.takeSnapshot();
    }

    this.finishRooms(this.rooms[0].center(), this.rooms[this.rooms.length - 1].center());
  }

  private splitIntoQuadrants(rect: Rect): void {
    const halfWidth = Math.max(Math.trunc(rect.width / 2), 1);
    const halfHeight = Math.max(Math.trunc(rect.height / 2), 1);

    this.partitions.push(new Rect(rect.x1, rect.y1, halfWidth, halfHeight));
    this.partitions.push(new Rect(rect.x1, rect.y1 + halfHeight, halfWidth, halfHeight));
    this.partitions.push(new Rect(rect.x1 + halfWidth, rect.y1, halfWidth, halfHeight));
    this.partitions.push(
      new Rect(rect.x1 + halfWidth, rect.y1 + halfHeight, halfWidth, halfHeight),
    );
  }

  private randomPartition(): Rect {
    if (this.partitions.length === 1) return this.partitions[0];
    return this.partitions[this.rng.rollDice(1, this.partitions.length) - 1];
  }

  private randomRoomWithin(partition: Rect): Rect {
    const w = this.roomSide(partition.width);
    const h = this.roomSide(partition.height);
    const x = partition.x1 + this.rng.rollDice(1, ROOM_OFFSET_SIDES) - 1;
    const y = partition.y1 + this.rng.rollDice(1, ROOM_OFFSET_SIDES) - 1;
    return new Rect(x, y, w, h);
  }

  private roomSide(space: number): number {
    const roll = this.rng.rollDice(1, Math.min(space, MAX_ROOM_ROLL)) - 1;
    return Math.max(MIN_ROOM_ROLL, roll) + 1;
  }

  /**
   * The room plus a margin (2 left/right/top, 1 below) must lie inside
   * the border ring and contain nothing but void or wall.
   */
  private hasSpaceFor(room: Rect): boolean {
    const { width, height } = this.grid;
    for (let y = room.y1 - 2; y <= room.y2 + 1; y++) {
      for (let x = room.x1 - 2; x <= room.x2 + 2; x++) {
        if (x < 1 || y < 1 || x > width - 2 || y > height - 2) return false;
        if (!this.grid.isVoidOrWall(x, y)) return false;
      }
    }
    return true;
  }

  /**
   * Random tile strictly inside a walled room's ring
   */
  private randomFloorTile(room: Rect): Point {
    return {
      x: room.x1 + this.rng.rollDice(1, room.width),
      y: room.y1 + this.rng.rollDice(1, room.height),
    };
  }
}
