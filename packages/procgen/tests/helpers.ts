import { DEFAULT_LIMITS, type RandomSource, SeededRandom, type SpawnSink, TileKind } from "@descent/contracts";
import { Grid } from "../src/core/grid/grid";
import type { StrategyContext } from "../src/generators/base/map-strategy";
import { logger } from "../src/logger";

const TILE_BY_CHAR: Record<string, TileKind> = {
  " ": TileKind.VOID,
  "?": TileKind.PLACEHOLDER,
  "#": TileKind.WALL,
  ".": TileKind.FLOOR,
  ">": TileKind.STAIRS_DOWN,
};

/**
 * Grid from ASCII rows using the default charset
 */
export function gridFromAscii(rows: readonly string[]): Grid {
  return Grid.fromRows(
    rows.map((row) =>
      Array.from(row, (char) => {
        const kind: TileKind | undefined = TILE_BY_CHAR[char];
        if (kind === undefined) throw new Error(`Unknown tile character: ${char}`);
        return kind;
      }),
    ),
  );
}

export function testContext(
  seed: number,
  overrides: Partial<StrategyContext> = {},
): StrategyContext {
  return {
    width: 80,
    height: 43,
    depth: 1,
    rng: new SeededRandom(seed),
    logger,
    limits: { ...DEFAULT_LIMITS },
    ...overrides,
  };
}

export const SEEDS = [1, 7, 42, 1234, 98765] as const;

/**
 * Random source that replays scripted dice results and fails loudly
 * when a test draws more than it scripted.
 */
export class ScriptedRandom implements RandomSource {
  private readonly rolls: number[];
  private drawIndex = 0;

  constructor(rolls: readonly number[], private readonly draws: readonly number[] = []) {
    this.rolls = [...rolls];
  }

  next(): number {
    const value: number | undefined = this.draws[this.drawIndex++];
    if (value === undefined) throw new Error("No scripted draw left");
    return value;
  }

  range(min: number, max: number): number {
    return this.rollDice(1, max - min + 1) - 1 + min;
  }

  rollDice(_count: number, _sides: number): number {
    const value = this.rolls.shift();
    if (value === undefined) throw new Error("No scripted roll left");
    return value;
  }

  get remaining(): number {
    return this.rolls.length;
  }
}

export interface SpawnCall {
  readonly kind: string;
  readonly x: number;
  readonly y: number;
}

/** Spawn sink that records every call */
export function recordingSink(): SpawnSink & { readonly calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  return {
    calls,
    spawn(kind, x, y) {
      calls.push({ kind, x, y });
    },
  };
}
