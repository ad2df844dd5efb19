import { SeededRandom, TileKind } from "@descent/contracts";
import { describe, expect, it } from "vitest";
import { Rect } from "../src/core/geometry/rect";
import { Grid } from "../src/core/grid/grid";
import { carveWalledRoom } from "../src/passes/carving/room-carvers";
import { planRegionSpawns, spawnRegion, spawnRoom } from "../src/passes/content/region-spawner";
import { RandomTable, roomTable } from "../src/passes/content/spawn-table";
import { recordingSink, ScriptedRandom } from "./helpers";

describe("RandomTable", () => {
  it("drops entries without weight", () => {
    const table = new RandomTable().add("a", 2).add("b", 0).add("c", -1).add("d", 3);
    expect(table.list().map((e) => e.name)).toEqual(["a", "d"]);
    expect(table.total).toBe(5);
  });

  it("maps a roll onto cumulative weights", () => {
    const table = new RandomTable().add("a", 2).add("b", 3);
    const rng = new ScriptedRandom([1, 2, 3, 5]);
    expect([table.roll(rng), table.roll(rng), table.roll(rng), table.roll(rng)]).toEqual([
      "a",
      "a",
      "b",
      "b",
    ]);
  });

  it("returns undefined for an empty table without rolling", () => {
    const rng = new ScriptedRandom([]);
    expect(new RandomTable().roll(rng)).toBeUndefined();
  });
});

describe("roomTable", () => {
  it("leaves deep-only gear out of the first level", () => {
    const table = roomTable(1);
    expect(table.list()).toHaveLength(11);
    expect(table.total).toBe(49);
    expect(table.list().map((e) => e.name)).not.toContain("Longsword");
  });

  it("weights monsters and gear by depth", () => {
    const weights = new Map(roomTable(4).list().map((e) => [e.name, e.weight]));
    expect(weights.get("Orc")).toBe(5);
    expect(weights.get("Longsword")).toBe(3);
    expect(weights.get("Goblin")).toBe(10);
    expect(roomTable(4).list()).toHaveLength(13);
  });
});

describe("planRegionSpawns", () => {
  const table = new RandomTable().add("Goblin", 1).add("Orc", 1);

  it("picks distinct tiles and a kind per pick", () => {
    const rng = new ScriptedRandom([7, 2, 1, 4, 2, 1, 2, 2, 1]);
    const placements = planRegionSpawns([10, 11, 12, 13, 14], 1, rng, table);

    expect(placements).toEqual([
      { index: 11, kind: "Goblin" },
      { index: 14, kind: "Orc" },
      { index: 10, kind: "Orc" },
      { index: 13, kind: "Goblin" },
    ]);
    expect(rng.remaining).toBe(0);
  });

  it("places nothing when the count roll is too low", () => {
    const rng = new ScriptedRandom([1]);
    expect(planRegionSpawns([1, 2, 3], 1, rng, table)).toEqual([]);
    expect(rng.remaining).toBe(0);
  });

  it("takes the last candidate without a roll", () => {
    const rng = new ScriptedRandom([7, 1]);
    expect(planRegionSpawns([42], 1, rng, table)).toEqual([{ index: 42, kind: "Goblin" }]);
  });

  it("spawns more at depth", () => {
    const rng = new ScriptedRandom([1, 1, 1, 1, 1]);
    // 1 + (3 - 1) - 3 = 0 at depth 3, 1 + (5 - 1) - 3 = 2 at depth 5
    expect(planRegionSpawns([1, 2, 3], 3, new ScriptedRandom([1]), table)).toEqual([]);
    expect(planRegionSpawns([1, 2, 3], 5, rng, table)).toHaveLength(2);
  });
});

describe("spawnRegion / spawnRoom", () => {
  it("reports placements to the sink as coordinates", () => {
    const grid = new Grid(10, 10, 1, TileKind.FLOOR);
    const sink = recordingSink();
    const placements = spawnRegion(grid, [grid.index(3, 4), grid.index(6, 7)], new SeededRandom(3), sink);

    expect(sink.calls).toHaveLength(placements.length);
    sink.calls.forEach((call, i) => {
      expect(grid.index(call.x, call.y)).toBe(placements[i].index);
      expect(call.kind).toBe(placements[i].kind);
    });
  });

  it("spawns only on floor strictly inside the room", () => {
    const room = new Rect(2, 2, 6, 6);
    for (const seed of [1, 2, 3, 4, 5, 6]) {
      const grid = new Grid(12, 12);
      carveWalledRoom(grid, room);
      const sink = recordingSink();
      spawnRoom(grid, room, new SeededRandom(seed), sink);

      const seen = new Set<string>();
      for (const { x, y } of sink.calls) {
        expect(x).toBeGreaterThan(room.x1);
        expect(x).toBeLessThan(room.x2);
        expect(y).toBeGreaterThan(room.y1);
        expect(y).toBeLessThan(room.y2);
        expect(grid.get(x, y)).toBe(TileKind.FLOOR);
        seen.add(`${x},${y}`);
      }
      expect(seen.size).toBe(sink.calls.length);
    }
  });
});
