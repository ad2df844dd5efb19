import {
  DungeonError,
  type GenerationLimits,
  type RandomSource,
  type SpawnSink,
  TileKind,
} from "@descent/contracts";
import type { Rect } from "../../core/geometry/rect";
import type { Point } from "../../core/geometry/types";
import { Grid } from "../../core/grid/grid";
import type { Logger } from "../../logger";
import { pruneAndFindExit } from "../../passes/connectivity/reachability";
import { spawnRegion, spawnRoom } from "../../passes/content/region-spawner";
import { partitionRegions, type RegionMap } from "../../passes/regions/noise-regions";
import type { AnyStrategyId } from "../strategy-ids";

/**
 * Receives a copy of the grid at milestones of a build. Copies have
 * every tile revealed. Observers cannot influence generation.
 */
export type SnapshotObserver = (snapshot: Grid) => void;

/**
 * Everything a strategy needs from the outside. The random source is
 * the single stream of the whole level request.
 */
export interface StrategyContext {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  readonly rng: RandomSource;
  readonly logger: Logger;
  readonly limits: GenerationLimits;
  readonly onSnapshot?: SnapshotObserver;
}

/**
 * Contract shared by every level generation algorithm.
 */
export interface MapStrategy {
  readonly id: AnyStrategyId;
  readonly name: string;

  /** Run the algorithm. Allowed once per instance. */
  build(): void;
  isBuilt(): boolean;
  /** Independent copy of the finished grid */
  getMap(): Grid;
  /** Floor tile from which every remaining floor tile is reachable */
  getStartingPosition(): Point;
  /** Position of the single down staircase */
  getExit(): Point;
  getRegions(): RegionMap;
  /** Hand spawn placements for the finished level to `sink` */
  spawn(sink: SpawnSink): void;
}

/**
 * Base class for all strategies.
 *
 * Owns the grid and the build-once guard. Subclasses implement
 * `generate()` and must end it by calling `finishRooms()` or
 * `finishWithPruning()`, which place the stairs and record the start.
 *
 * @abstract
 */
export abstract class BaseMapStrategy implements MapStrategy {
  abstract readonly id: AnyStrategyId;
  abstract readonly name: string;

  protected readonly grid: Grid;
  protected readonly rng: RandomSource;
  protected readonly logger: Logger;
  protected regions: RegionMap = new Map();

  private built = false;
  private start: Point | null = null;
  private exit: Point | null = null;

  constructor(
    protected readonly context: StrategyContext,
    fill: TileKind = TileKind.WALL,
  ) {
    this.grid = new Grid(context.width, context.height, context.depth, fill);
    this.rng = context.rng;
    this.logger = context.logger;
  }

  /**
   * Fill the grid. Called exactly once by `build()`.
   */
  protected abstract generate(): void;

  build(): void {
    if (this.built) {
      throw new DungeonError("ALREADY_BUILT", `Strategy ${this.id} was already built`);
    }
    this.built = true;

    this.generate();

    const start = this.requireStart();
    this.logger.debug(
      {
        strategy: this.id,
        start,
        exit: this.exit,
        floor: this.grid.count(TileKind.FLOOR),
        regions: this.regions.size,
      },
      "Level built",
    );
  }

  isBuilt(): boolean {
    return this.built && this.start !== null;
  }

  getMap(): Grid {
    this.requireStart();
    return this.grid.clone();
  }

  getStartingPosition(): Point {
    return this.requireStart();
  }

  getExit(): Point {
    this.requireStart();
    if (this.exit === null) {
      throw new DungeonError("NOT_BUILT", `Strategy ${this.id} has no exit`);
    }
    return this.exit;
  }

  getRegions(): RegionMap {
    this.requireStart();
    return new Map(Array.from(this.regions, ([id, tiles]) => [id, [...tiles]]));
  }

  /**
   * Spawn one batch per region.
   */
  spawn(sink: SpawnSink): void {
    this.requireStart();
    for (const area of this.regions.values()) {
      spawnRegion(this.grid, area, this.rng, sink);
    }
  }

  // ===========================================================================
  // HELPERS FOR SUBCLASSES
  // ===========================================================================

  protected takeSnapshot(): void {
    this.context.onSnapshot?.(this.grid.snapshot());
  }

  /**
   * Finish a cave-like level: prune what `start` cannot reach, put the
   * stairs on the furthest floor tile and partition spawn regions.
   */
  protected finishWithPruning(start: Point): void {
    const startIndex = this.grid.index(start.x, start.y);
    const exitIndex = pruneAndFindExit(this.grid, startIndex);
    this.takeSnapshot();

    this.placeExit(this.grid.toPoint(exitIndex));
    this.start = start;
    this.regions = partitionRegions(this.grid, this.rng);
  }

  /**
   * Finish a room-based level: start and stairs at the given room
   * centres. Room layouts are connected by construction.
   */
  protected finishRooms(start: Point, exit: Point): void {
    this.placeExit(exit);
    this.start = start;
  }

  /**
   * Throws ITERATION_LIMIT_EXCEEDED once `count` passes `limit`.
   */
  protected checkLimit(loop: string, count: number, limit: number): void {
    if (count > limit) {
      throw DungeonError.iterationLimit(loop, limit, { strategy: this.id });
    }
  }

  private placeExit(exit: Point): void {
    this.grid.set(exit.x, exit.y, TileKind.STAIRS_DOWN);
    this.grid.populateBlocked();
    this.exit = exit;
    this.takeSnapshot();
  }

  private requireStart(): Point {
    if (this.start === null) {
      throw new DungeonError("NOT_BUILT", `Strategy ${this.id} has not been built`);
    }
    return this.start;
  }
}

/**
 * Strategy whose level is a list of rooms. Spawns go into every room
 * except the first, which holds the player.
 */
export abstract class RoomMapStrategy extends BaseMapStrategy {
  protected readonly rooms: Rect[] = [];

  getRooms(): readonly Rect[] {
    return this.rooms;
  }

  override spawn(sink: SpawnSink): void {
    this.getStartingPosition();
    for (const room of this.rooms.slice(1)) {
      spawnRoom(this.grid, room, this.rng, sink);
    }
  }
}
