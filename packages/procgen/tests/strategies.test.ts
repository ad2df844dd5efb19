import { DungeonError, TileKind } from "@descent/contracts";
import { describe, expect, it } from "vitest";
import type { Point } from "../src/core/geometry/types";
import type { Grid } from "../src/core/grid/grid";
import type { MapStrategy } from "../src/generators/base/map-strategy";
import { CellularAutomataGenerator } from "../src/generators/cellular-automata/generator";
import { OPEN_AREA } from "../src/generators/drunkard/constants";
import { DrunkardWalkGenerator } from "../src/generators/drunkard/generator";
import { MazeGenerator } from "../src/generators/maze/generator";
import { createStrategy } from "../src/generators/registry";
import { SimpleRoomsGenerator } from "../src/generators/simple-rooms/generator";
import { STRATEGY_IDS } from "../src/generators/strategy-ids";
import { seedDistance } from "../src/generators/voronoi/generator";
import { findUnreachableFloor } from "../src/passes/connectivity/reachability";
import { recordingSink, testContext } from "./helpers";

function expectPlayable(map: Grid, start: Point, exit: Point): void {
  expect(map.count(TileKind.PLACEHOLDER)).toBe(0);
  expect(map.findAll(TileKind.STAIRS_DOWN)).toEqual([map.index(exit.x, exit.y)]);
  expect(map.get(start.x, start.y)).toBe(TileKind.FLOOR);
  expect(findUnreachableFloor(map, start)).toEqual([]);
}

/** Builds, moving to the next seed when an attempt is unusable */
function buildFirstUsable(id: string, seeds: readonly number[]): MapStrategy {
  for (const seed of seeds) {
    const strategy = createStrategy(id, testContext(seed));
    try {
      strategy.build();
      return strategy;
    } catch (error) {
      if (!DungeonError.isFatalAttemptError(error)) throw error;
    }
  }
  throw new Error(`No usable ${id} level for seeds ${seeds.join(", ")}`);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return DungeonError.isDungeonError(error) ? error.code : undefined;
  }
  return undefined;
}

describe.each(STRATEGY_IDS)("%s", (id) => {
  it("builds playable levels", { timeout: 30_000 }, () => {
    for (const seeds of [[1, 2, 3], [42, 43, 44], [1234, 1235, 1236]]) {
      const strategy = buildFirstUsable(id, seeds);
      expect(strategy.id).toBe(id);
      expectPlayable(strategy.getMap(), strategy.getStartingPosition(), strategy.getExit());
    }
  });

  it("is deterministic for a seed", { timeout: 30_000 }, () => {
    const a = buildFirstUsable(id, [11, 12, 13]);
    const b = buildFirstUsable(id, [11, 12, 13]);
    expect(a.getMap().equals(b.getMap())).toBe(true);
    expect(a.getStartingPosition()).toEqual(b.getStartingPosition());
    expect(a.getExit()).toEqual(b.getExit());
  });
});

describe("strategy lifecycle", () => {
  it("refuses to build twice", () => {
    const strategy = new CellularAutomataGenerator(testContext(5));
    strategy.build();
    expect(codeOf(() => strategy.build())).toBe("ALREADY_BUILT");
  });

  it("refuses to hand out results before building", () => {
    const strategy = new MazeGenerator(testContext(5));
    expect(strategy.isBuilt()).toBe(false);
    expect(codeOf(() => strategy.getMap())).toBe("NOT_BUILT");
    expect(codeOf(() => strategy.getStartingPosition())).toBe("NOT_BUILT");
    expect(codeOf(() => strategy.getExit())).toBe("NOT_BUILT");
  });

  it("hands out copies", () => {
    const strategy = new MazeGenerator(testContext(5));
    strategy.build();
    const map = strategy.getMap();
    map.fill(TileKind.VOID);
    expect(strategy.getMap().count(TileKind.VOID)).toBe(0);

    const regions = strategy.getRegions();
    regions.clear();
    expect(strategy.getRegions().size).toBeGreaterThan(0);
  });

  it("stops runaway walkers at the configured limit", () => {
    const context = testContext(3, { limits: { maxWalkers: 1, maxWalkerSteps: 1_000_000 } });
    const strategy = new DrunkardWalkGenerator(context, "drunkard-open-area", "test", OPEN_AREA);
    expect(codeOf(() => strategy.build())).toBe("ITERATION_LIMIT_EXCEEDED");
  });

  it.each([
    ["drunkard-winding-passages", "drunkard walkers"],
    ["dla-walk-outwards", "DLA walkers"],
  ])("caps the %s walker count", (id, loop) => {
    const limits = { maxWalkers: 5, maxWalkerSteps: 1_000_000 };
    const strategy = createStrategy(id, testContext(3, { limits }));
    let error: unknown;
    try {
      strategy.build();
    } catch (caught) {
      error = caught;
    }

    expect(DungeonError.isDungeonError(error)).toBe(true);
    if (!DungeonError.isDungeonError(error)) return;
    expect(error.code).toBe("ITERATION_LIMIT_EXCEEDED");
    expect(error.details).toEqual({ loop, limit: 5, strategy: id });
  });
});

describe("snapshots", () => {
  it("reports milestones with every tile revealed", () => {
    const snapshots: Grid[] = [];
    const strategy = new CellularAutomataGenerator(
      testContext(8, { onSnapshot: (grid) => snapshots.push(grid) }),
    );
    strategy.build();

    // noise, 15 smoothing passes, pruning, stairs
    expect(snapshots).toHaveLength(18);
    expect(snapshots.every((s) => s.revealed.every(Boolean))).toBe(true);
    expect(snapshots[snapshots.length - 1].equals(strategy.getMap())).toBe(true);
  });

  it.each(["drunkard-open-halls", "maze", "dla-insectoid"])(
    "does not change the %s output",
    (id) => {
      let count = 0;
      const observed = createStrategy(id, testContext(21, { onSnapshot: () => count++ }));
      const plain = createStrategy(id, testContext(21));
      observed.build();
      plain.build();

      expect(count).toBeGreaterThan(0);
      expect(observed.getMap().equals(plain.getMap())).toBe(true);
    },
    30_000,
  );
});

describe("SimpleRoomsGenerator", () => {
  it("places non-overlapping rooms and joins the first to the last", () => {
    const strategy = new SimpleRoomsGenerator(testContext(42));
    strategy.build();
    const rooms = strategy.getRooms();

    expect(rooms.length).toBeGreaterThanOrEqual(2);
    for (let i = 0; i < rooms.length; i++) {
      for (let j = i + 1; j < rooms.length; j++) {
        expect(rooms[i].intersects(rooms[j])).toBe(false);
      }
    }
    expect(strategy.getStartingPosition()).toEqual(rooms[0].center());
    expect(strategy.getExit()).toEqual(rooms[rooms.length - 1].center());
  });

  it("spawns into every room except the first", () => {
    const strategy = new SimpleRoomsGenerator(testContext(42));
    strategy.build();
    const [first] = strategy.getRooms();
    const sink = recordingSink();
    strategy.spawn(sink);

    for (const { x, y } of sink.calls) {
      expect(first.contains({ x, y })).toBe(false);
    }
  });
});

describe("CellularAutomataGenerator", () => {
  it("starts on floor left of or at the centre row's middle", () => {
    const strategy = new CellularAutomataGenerator(testContext(99));
    strategy.build();
    const start = strategy.getStartingPosition();

    expect(start.y).toBe(21);
    expect(start.x).toBeLessThanOrEqual(40);
    expect(strategy.getMap().get(start.x, start.y)).toBe(TileKind.FLOOR);
  });

  it("keeps the outer border solid", () => {
    const strategy = new CellularAutomataGenerator(testContext(99));
    strategy.build();
    const map = strategy.getMap();
    for (let x = 0; x < map.width; x++) {
      expect(map.get(x, 0)).toBe(TileKind.WALL);
      expect(map.get(x, map.height - 1)).toBe(TileKind.WALL);
    }
  });
});

describe("seedDistance", () => {
  it("measures with each metric", () => {
    const a = { x: 1, y: 1 };
    const b = { x: 4, y: 5 };
    expect(seedDistance("pythagoras", a, b)).toBe(25);
    expect(seedDistance("manhattan", a, b)).toBe(7);
    expect(seedDistance("chebyshev", a, b)).toBe(4);
  });
});
