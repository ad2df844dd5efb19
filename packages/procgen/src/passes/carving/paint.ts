/**
 * Brush painting with optional mirror symmetry, used by the walker
 * strategies to stamp floor where a walker stops.
 */

import { TileKind } from "@descent/contracts";
import type { Grid } from "../../core/grid/grid";

export type Symmetry = "none" | "horizontal" | "vertical" | "both";

/**
 * Paint `kind` at (x, y) and at its mirror images across the grid's
 * centre lines. Returns how many tiles changed to `kind`.
 */
export function paint(
  grid: Grid,
  symmetry: Symmetry,
  brushSize: number,
  x: number,
  y: number,
  kind: TileKind = TileKind.FLOOR,
): number {
  const { x: centerX, y: centerY } = grid.center();
  const xs = symmetry === "horizontal" || symmetry === "both" ? mirror(x, centerX) : [x];
  const ys = symmetry === "vertical" || symmetry === "both" ? mirror(y, centerY) : [y];

  let changed = 0;
  for (const px of xs) {
    for (const py of ys) {
      changed += applyBrush(grid, brushSize, px, py, kind);
    }
  }
  return changed;
}

function mirror(value: number, center: number): number[] {
  if (value === center) return [value];
  const distance = Math.abs(center - value);
  return [center + distance, center - distance];
}

/**
 * A brush of 1 paints a single tile. Larger brushes cover
 * x - half .. x + half - 1 (rows likewise), skipping the first two
 * columns and rows and the last one.
 */
function applyBrush(grid: Grid, brushSize: number, x: number, y: number, kind: TileKind): number {
  if (brushSize <= 1) {
    return grid.isInBounds(x, y) ? stamp(grid, x, y, kind) : 0;
  }

  let changed = 0;
  const half = Math.trunc(brushSize / 2);
  for (let by = y - half; by < y + half; by++) {
    for (let bx = x - half; bx < x + half; bx++) {
      if (bx > 1 && bx < grid.width - 1 && by > 1 && by < grid.height - 1) {
        changed += stamp(grid, bx, by, kind);
      }
    }
  }
  return changed;
}

function stamp(grid: Grid, x: number, y: number, kind: TileKind): number {
  if (grid.get(x, y) === kind) return 0;
  grid.set(x, y, kind);
  return 1;
}
