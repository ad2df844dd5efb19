/**
 * Drunkard's Walk Presets
 */

export type DrunkardSpawnMode = "starting-point" | "random";

export interface DrunkardSettings {
  /** Where every walker after the first starts */
  readonly spawnMode: DrunkardSpawnMode;
  /** Steps per walker */
  readonly lifetime: number;
  /** Stop once this fraction of all tiles is floor */
  readonly floorPercent: number;
}

/** One large blob grown from the centre */
export const OPEN_AREA: DrunkardSettings = Object.freeze({
  spawnMode: "starting-point",
  lifetime: 400,
  floorPercent: 0.5,
});

/** Blobs scattered across the level */
export const OPEN_HALLS: DrunkardSettings = Object.freeze({
  spawnMode: "random",
  lifetime: 400,
  floorPercent: 0.5,
});

/** Short-lived walkers leave thin winding tunnels */
export const WINDING_PASSAGES: DrunkardSettings = Object.freeze({
  spawnMode: "starting-point",
  lifetime: 100,
  floorPercent: 0.4,
});
