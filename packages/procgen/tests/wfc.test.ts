import { DungeonError, SeededRandom, TileKind } from "@descent/contracts";
import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid/grid";
import { CellularAutomataGenerator } from "../src/generators/cellular-automata/generator";
import { oppositeSide, Side, SIDES } from "../src/generators/wfc/constants";
import { WfcDerivedGenerator } from "../src/generators/wfc/generator";
import {
  areCompatible,
  buildPatterns,
  type MapChunk,
  patternsToConstraints,
  sidesAgree,
} from "../src/generators/wfc/patterns";
import { intersectAll, solveChunks, WfcSolver } from "../src/generators/wfc/solver";
import { findUnreachableFloor } from "../src/passes/connectivity/reachability";
import { gridFromAscii, ScriptedRandom, testContext } from "./helpers";

const W = TileKind.WALL;
const F = TileKind.FLOOR;

function solidChunk(size: number): MapChunk {
  return {
    pattern: new Array<TileKind>(size * size).fill(W),
    exits: [[], [], [], []],
    hasExits: false,
    compatibleWith: [[0], [0], [0], [0]],
  };
}

function trySolve(constraints: readonly MapChunk[], grid: Grid, seed: number): WfcSolver | null {
  try {
    return solveChunks(constraints, 8, grid, new SeededRandom(seed), 100);
  } catch (error) {
    if (DungeonError.isDungeonError(error) && error.code === "SOLVER_RETRIES_EXHAUSTED") {
      return null;
    }
    throw error;
  }
}

function caveMap(seed: number): Grid {
  const strategy = new CellularAutomataGenerator(testContext(seed));
  strategy.build();
  return strategy.getMap();
}

describe("buildPatterns", () => {
  it("reduces an all-floor grid to a single open pattern", () => {
    const grid = new Grid(8, 8, 1, F);
    const patterns = buildPatterns(grid, 8, true, true);
    expect(patterns).toHaveLength(1);

    const [chunk] = patternsToConstraints(patterns, 8);
    expect(chunk.hasExits).toBe(true);
    for (const side of SIDES) {
      expect(chunk.exits[side]).toEqual(new Array<boolean>(8).fill(true));
      expect(chunk.compatibleWith[side]).toEqual([0]);
    }
  });

  it("adds the three mirror images after each chunk", () => {
    const grid = gridFromAscii(["#...", "####", "####", "####"]);
    const patterns = buildPatterns(grid, 4, true, false);

    expect(patterns).toHaveLength(4);
    expect(patterns[0].slice(0, 4)).toEqual([W, F, F, F]);
    expect(patterns[1].slice(0, 4)).toEqual([F, F, F, W]);
    expect(patterns[2].slice(12)).toEqual([W, F, F, F]);
    expect(patterns[3].slice(12)).toEqual([F, F, F, W]);
    expect(patterns[2].slice(0, 4)).toEqual([W, W, W, W]);
  });

  it("skips partial chunks along the right and bottom edges", () => {
    const grid = new Grid(10, 7, 1, W);
    expect(buildPatterns(grid, 3, false, false)).toHaveLength(3 * 2);
  });

  it("keeps the first occurrence of each pattern when deduplicating", () => {
    const source = caveMap(4);
    const all = buildPatterns(source, 8, true, false);
    const unique = buildPatterns(source, 8, true, true);

    const seen = new Set<string>();
    const expected = all.filter((p) => {
      const key = p.join(",");
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
    expect(unique).toEqual(expected);
    expect(new Set(unique.map((p) => p.join(","))).size).toBe(unique.length);
  });
});

describe("patternsToConstraints", () => {
  it("records floor on each border as an exit", () => {
    const grid = gridFromAscii(["#...", "####", "####", "####"]);
    const [chunk] = patternsToConstraints(buildPatterns(grid, 4, false, false), 4);

    expect(chunk.exits[Side.NORTH]).toEqual([false, true, true, true]);
    expect(chunk.exits[Side.SOUTH]).toEqual([false, false, false, false]);
    expect(chunk.exits[Side.WEST]).toEqual([false, false, false, false]);
    expect(chunk.exits[Side.EAST]).toEqual([true, false, false, false]);
    expect(chunk.hasExits).toBe(true);
  });

  it("marks a solid chunk as having no exits and fitting anywhere", () => {
    const grid = gridFromAscii(["####....", "####....", "####....", "####...."]);
    const constraints = patternsToConstraints(buildPatterns(grid, 4, false, false), 4);

    expect(constraints[0].hasExits).toBe(false);
    for (const side of SIDES) {
      expect(constraints[0].compatibleWith[side]).toEqual([0, 1]);
    }
  });

  it("builds a symmetric relation", () => {
    const constraints = patternsToConstraints(buildPatterns(caveMap(6), 8, true, true), 8);
    constraints.forEach((chunk, i) => {
      for (const side of SIDES) {
        for (const j of chunk.compatibleWith[side]) {
          expect(constraints[j].compatibleWith[oppositeSide(side)]).toContain(i);
        }
      }
    });
  });
});

describe("sidesAgree", () => {
  it("lets a closed side face anything", () => {
    expect(sidesAgree([false, false], [true, true])).toBe(true);
    expect(sidesAgree([true, false], [false, false])).toBe(true);
  });

  it("needs a shared opening between two open sides", () => {
    expect(sidesAgree([true, false], [false, true])).toBe(false);
    expect(sidesAgree([true, true], [false, true])).toBe(true);
  });
});

describe("intersectAll", () => {
  it("keeps the first list's order", () => {
    expect(intersectAll([[3, 1, 2], [2, 3]])).toEqual([3, 2]);
    expect(intersectAll([[5]])).toEqual([5]);
    expect(intersectAll([])).toEqual([]);
  });
});

describe("WfcSolver", () => {
  it("fills every slot with the only pattern there is", () => {
    const grid = new Grid(16, 16, 1, F);
    const solver = solveChunks([solidChunk(8)], 8, grid, new SeededRandom(1), 1);

    expect(solver.possible).toBe(true);
    expect(solver.chunks).toEqual([0, 0, 0, 0]);
    expect(grid.count(W)).toBe(256);
  });

  it("bootstraps at random, then follows the neighbours without rolling", () => {
    const grid = new Grid(8, 4, 1, F);
    const solver = new WfcSolver([solidChunk(4)], 4, grid);
    const rng = new ScriptedRandom([2, 1]);

    expect(solver.iteration(grid, rng)).toBe(false);
    expect(solver.chunks).toEqual([null, 0]);
    expect(solver.iteration(grid, rng)).toBe(true);
    expect(solver.chunks).toEqual([0, 0]);
    expect(rng.remaining).toBe(0);
  });

  it("gives up after the configured number of contradictions", () => {
    const dead: MapChunk = { ...solidChunk(4), compatibleWith: [[], [], [], []] };
    const grid = new Grid(8, 4, 1, F);
    let error: unknown;
    try {
      solveChunks([dead], 4, grid, new SeededRandom(2), 3);
    } catch (caught) {
      error = caught;
    }

    expect(DungeonError.isDungeonError(error)).toBe(true);
    if (!DungeonError.isDungeonError(error)) return;
    expect(error.code).toBe("SOLVER_RETRIES_EXHAUSTED");
    expect(error.details).toEqual({ attempts: 3, patterns: 1 });
  });

  it("only places compatible chunks side by side", () => {
    let solved = 0;
    for (const seed of [1, 2, 3, 4, 5]) {
      const source = caveMap(seed);
      const constraints = patternsToConstraints(buildPatterns(source, 8, true, true), 8);
      const grid = new Grid(source.width, source.height);

      const solver = trySolve(constraints, grid, seed);
      if (solver === null) continue;
      solved++;

      const { chunksX, chunksY, chunks } = solver;
      for (let cy = 0; cy < chunksY; cy++) {
        for (let cx = 0; cx < chunksX; cx++) {
          const here = constraints[chunks[cy * chunksX + cx] ?? -1];
          if (cx + 1 < chunksX) {
            const east = constraints[chunks[cy * chunksX + cx + 1] ?? -1];
            expect(areCompatible(here, east, Side.EAST)).toBe(true);
          }
          if (cy + 1 < chunksY) {
            const south = constraints[chunks[(cy + 1) * chunksX + cx] ?? -1];
            expect(areCompatible(here, south, Side.SOUTH)).toBe(true);
          }
        }
      }
    }
    expect(solved).toBeGreaterThan(0);
  });
});

describe("WfcDerivedGenerator", () => {
  it("derives a playable level that leaves the trailing rows solid", () => {
    let built = 0;
    for (const seed of [1, 2, 3, 4, 5]) {
      const context = testContext(seed + 100);
      const derived = new WfcDerivedGenerator(context, caveMap(seed), { chunkSize: 8 });
      try {
        derived.build();
      } catch (error) {
        if (DungeonError.isDungeonError(error)) continue;
        throw error;
      }
      built++;

      const map = derived.getMap();
      const start = derived.getStartingPosition();
      expect(derived.id).toBe("wfc-derived");
      expect(map.count(TileKind.PLACEHOLDER)).toBe(0);
      expect(map.findAll(TileKind.STAIRS_DOWN)).toHaveLength(1);
      expect(map.get(start.x, start.y)).toBe(F);
      expect(findUnreachableFloor(map, start)).toEqual([]);
      for (let y = 40; y < 43; y++) {
        for (let x = 0; x < 80; x++) {
          expect(map.get(x, y)).toBe(W);
        }
      }
    }
    expect(built).toBeGreaterThan(0);
  }, 60_000);
});
