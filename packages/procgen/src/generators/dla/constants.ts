/**
 * Diffusion-Limited Aggregation Variants
 */

import type { Symmetry } from "../../passes/carving/paint";

export type DlaAlgorithm = "walk-inwards" | "walk-outwards" | "central-attractor";

export interface DlaSettings {
  readonly algorithm: DlaAlgorithm;
  readonly brushSize: number;
  readonly symmetry: Symmetry;
  /** Stop once this fraction of all tiles is floor */
  readonly floorPercent: number;
}

/** Walkers drift in from random points and stick to the blob */
export const WALK_INWARDS: DlaSettings = Object.freeze({
  algorithm: "walk-inwards",
  brushSize: 1,
  symmetry: "none",
  floorPercent: 0.25,
});

/** Walkers leave the centre and dig where they first hit rock */
export const WALK_OUTWARDS: DlaSettings = Object.freeze({
  algorithm: "walk-outwards",
  brushSize: 2,
  symmetry: "none",
  floorPercent: 0.25,
});

/** Walkers head straight for the centre */
export const CENTRAL_ATTRACTOR: DlaSettings = Object.freeze({
  algorithm: "central-attractor",
  brushSize: 2,
  symmetry: "none",
  floorPercent: 0.25,
});

/** Central attractor mirrored left to right */
export const INSECTOID: DlaSettings = Object.freeze({
  algorithm: "central-attractor",
  brushSize: 2,
  symmetry: "horizontal",
  floorPercent: 0.25,
});
