/**
 * Utility functions for random operations using any number generator
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Roll `count` dice with `sides` faces each and sum them.
 * A die with fewer than one face always shows 1.
 */
export function rollDice(
  rng: () => number,
  count: number,
  sides: number,
): number {
  let total = 0;
  for (let i = 0; i < count; i++) {
    total += sides < 1 ? 1 : range(rng, 1, sides);
  }
  return total;
}
