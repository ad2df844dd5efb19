import type { RandomSource } from "@descent/contracts";
import type { Point } from "../core/geometry/types";

/**
 * One random step on a 1d4: west, east, north, south. Walkers stay
 * within x in [2, width - 2] and y in [2, height - 2]; a step that
 * would leave that band is skipped.
 */
export function stagger(
  position: Point,
  width: number,
  height: number,
  rng: RandomSource,
): Point {
  let { x, y } = position;
  switch (rng.rollDice(1, 4)) {
    case 1:
      if (x > 2) x -= 1;
      break;
    case 2:
      if (x < width - 2) x += 1;
      break;
    case 3:
      if (y > 2) y -= 1;
      break;
    default:
      if (y < height - 2) y += 1;
  }
  return { x, y };
}

/**
 * Random walker origin with x in [2, width - 2] and y in [2, height - 2]
 */
export function randomWalkerOrigin(width: number, height: number, rng: RandomSource): Point {
  return {
    x: rng.rollDice(1, width - 3) + 1,
    y: rng.rollDice(1, height - 3) + 1,
  };
}
