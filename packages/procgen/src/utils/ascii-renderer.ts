/**
 * ASCII Level Renderer
 *
 * Renders level grids as text for debug logs and test diagnostics.
 *
 * @example
 * ```typescript
 * const level = generateLevel({ depth: 3, seed: 42 });
 * console.log(renderAscii(level.map, { marks: [{ point: level.start, char: "@" }] }));
 * ```
 */

import { TileKind } from "@descent/contracts";
import type { Point } from "../core/geometry/types";
import type { Grid } from "../core/grid/grid";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character per tile kind
 */
export type AsciiCharset = Readonly<Record<TileKind, string>>;

export const DEFAULT_CHARSET: AsciiCharset = {
  [TileKind.VOID]: " ",
  [TileKind.PLACEHOLDER]: "?",
  [TileKind.WALL]: "#",
  [TileKind.FLOOR]: ".",
  [TileKind.STAIRS_DOWN]: ">",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Single characters drawn over the tiles, later marks win */
  readonly marks?: readonly { readonly point: Point; readonly char: string }[];
}

// =============================================================================
// RENDERING
// =============================================================================

/**
 * One line per grid row, joined with "\n"
 */
export function renderAscii(grid: Grid, options: RenderOptions = {}): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const rows: string[][] = [];

  for (let y = 0; y < grid.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < grid.width; x++) {
      row.push(charset[grid.get(x, y)]);
    }
    rows.push(row);
  }

  for (const mark of options.marks ?? []) {
    if (grid.containsPoint(mark.point)) {
      rows[mark.point.y][mark.point.x] = mark.char;
    }
  }

  return rows.map((row) => row.join("")).join("\n");
}
