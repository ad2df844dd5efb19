/**
 * Noise Regions
 *
 * Groups floor tiles into spawn regions by bucketing a cellular noise
 * field. Neighbouring tiles usually land in the same bucket, which
 * yields Voronoi-like patches. It is a bucketed approximation and not a
 * geometric Voronoi diagram: spawn density was tuned against it.
 */

import { type RandomSource, TileKind } from "@descent/contracts";
import {
  REGION_BUCKET_SCALE,
  REGION_NOISE_FREQUENCY,
  REGION_NOISE_SEED_SIDES,
} from "../../core/constants";
import type { Grid } from "../../core/grid/grid";
import { cellValueNoise } from "../../core/noise/cellular-noise";

/** Region id to ascending floor-tile indices */
export type RegionMap = Map<number, number[]>;

export interface RegionOptions {
  readonly frequency?: number;
}

/**
 * Partition interior floor tiles (border rows and columns excluded).
 * Draws one 1d65536 roll from `rng` for the noise seed.
 */
export function partitionRegions(
  grid: Grid,
  rng: RandomSource,
  options: RegionOptions = {},
): RegionMap {
  const seed = rng.rollDice(1, REGION_NOISE_SEED_SIDES);
  const frequency = options.frequency ?? REGION_NOISE_FREQUENCY;
  const regions: RegionMap = new Map();

  for (let y = 1; y < grid.height - 1; y++) {
    for (let x = 1; x < grid.width - 1; x++) {
      if (grid.get(x, y) !== TileKind.FLOOR) continue;

      const bucket = Math.trunc(
        cellValueNoise(seed, frequency, x, y) * REGION_BUCKET_SCALE,
      );
      const tiles = regions.get(bucket);
      if (tiles) {
        tiles.push(grid.index(x, y));
      } else {
        regions.set(bucket, [grid.index(x, y)]);
      }
    }
  }

  return regions;
}
