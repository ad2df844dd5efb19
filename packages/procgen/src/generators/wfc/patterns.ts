/**
 * Pattern extraction for Wave Function Collapse.
 *
 * A finished map is cut into square chunks; each distinct chunk becomes
 * a pattern, and patterns record which others may sit next to them.
 */

import { TileKind } from "@descent/contracts";
import type { Grid } from "../../core/grid/grid";
import { oppositeSide, type Side, SIDES } from "./constants";

export type Pattern = readonly TileKind[];

/** One per side, in Side order */
export type SideTuple<T> = readonly [T, T, T, T];

export interface ChunkEdges {
  /** Per side, true where the border tile is floor */
  readonly exits: SideTuple<readonly boolean[]>;
  /** False when no border tile on any side is floor */
  readonly hasExits: boolean;
}

export interface MapChunk extends ChunkEdges {
  /** chunkSize² tiles, row-major */
  readonly pattern: Pattern;
  /** Per side, indices of chunks allowed on that side */
  readonly compatibleWith: SideTuple<readonly number[]>;
}

/**
 * Cut `grid` into chunkSize x chunkSize patterns, row by row. Partial
 * chunks along the right and bottom edges are skipped.
 *
 * With `includeFlips`, each chunk is followed by its horizontal,
 * vertical and two-axis mirror images. With `dedupe`, only the first
 * occurrence of each distinct pattern is kept.
 */
export function buildPatterns(
  grid: Grid,
  chunkSize: number,
  includeFlips: boolean,
  dedupe: boolean,
): Pattern[] {
  const chunksX = Math.trunc(grid.width / chunkSize);
  const chunksY = Math.trunc(grid.height / chunkSize);
  const patterns: Pattern[] = [];

  for (let cy = 0; cy < chunksY; cy++) {
    for (let cx = 0; cx < chunksX; cx++) {
      const left = cx * chunkSize;
      const top = cy * chunkSize;
      const right = left + chunkSize;
      const bottom = top + chunkSize;

      patterns.push(readChunk(chunkSize, (x, y) => grid.get(left + x, top + y)));
      if (!includeFlips) continue;

      patterns.push(readChunk(chunkSize, (x, y) => grid.get(right - 1 - x, top + y)));
      patterns.push(readChunk(chunkSize, (x, y) => grid.get(left + x, bottom - 1 - y)));
      patterns.push(
        readChunk(chunkSize, (x, y) => grid.get(right - 1 - x, bottom - 1 - y)),
      );
    }
  }

  return dedupe ? dedupePatterns(patterns) : patterns;
}

function readChunk(
  chunkSize: number,
  tileAt: (x: number, y: number) => TileKind,
): Pattern {
  const pattern: TileKind[] = [];
  for (let y = 0; y < chunkSize; y++) {
    for (let x = 0; x < chunkSize; x++) {
      pattern.push(tileAt(x, y));
    }
  }
  return pattern;
}

function dedupePatterns(patterns: readonly Pattern[]): Pattern[] {
  const unique = new Map<string, Pattern>();
  for (const pattern of patterns) {
    const key = pattern.join(",");
    if (!unique.has(key)) unique.set(key, pattern);
  }
  return [...unique.values()];
}

/**
 * True when two facing sides may touch: either side is solid rock, or
 * they share at least one open slot.
 */
export function sidesAgree(a: readonly boolean[], b: readonly boolean[]): boolean {
  if (!a.includes(true) || !b.includes(true)) return true;
  return a.some((open, i) => open && b[i] === true);
}

/**
 * Whether `b` may be placed on `side` of `a`.
 */
export function areCompatible(a: ChunkEdges, b: ChunkEdges, side: Side): boolean {
  if (!a.hasExits || !b.hasExits) return true;
  return sidesAgree(a.exits[side], b.exits[oppositeSide(side)]);
}

/**
 * Compute exits and per-side compatibility for every pattern. Each side
 * is evaluated on its own, and the relation is symmetric: if B may sit
 * east of A then A may sit west of B.
 */
export function patternsToConstraints(
  patterns: readonly Pattern[],
  chunkSize: number,
): MapChunk[] {
  const shapes = patterns.map((pattern) => {
    const exits = computeExits(pattern, chunkSize);
    return { pattern, exits, hasExits: exits.some((side) => side.includes(true)) };
  });

  return shapes.map((shape): MapChunk => {
    const compatibleWith: [number[], number[], number[], number[]] = [[], [], [], []];
    for (const side of SIDES) {
      shapes.forEach((other, j) => {
        if (areCompatible(shape, other, side)) compatibleWith[side].push(j);
      });
    }
    return { ...shape, compatibleWith };
  });
}

function computeExits(pattern: Pattern, chunkSize: number): SideTuple<boolean[]> {
  const north: boolean[] = [];
  const south: boolean[] = [];
  const west: boolean[] = [];
  const east: boolean[] = [];
  const at = (x: number, y: number) => pattern[y * chunkSize + x] === TileKind.FLOOR;

  for (let i = 0; i < chunkSize; i++) {
    north.push(at(i, 0));
    south.push(at(i, chunkSize - 1));
    west.push(at(0, i));
    east.push(at(chunkSize - 1, i));
  }
  return [north, south, west, east];
}
