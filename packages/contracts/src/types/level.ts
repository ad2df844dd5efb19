/**
 * Tile kinds stored in a level grid.
 *
 * PLACEHOLDER marks tiles carved by a walker that has not finished yet;
 * it never survives a completed build.
 */
export const TileKind = {
  VOID: 0,
  PLACEHOLDER: 1,
  WALL: 2,
  FLOOR: 3,
  STAIRS_DOWN: 4,
} as const;

export type TileKind = (typeof TileKind)[keyof typeof TileKind];

/**
 * Integer tile coordinate
 */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/**
 * Receives entity placement requests once a level is built. Entity
 * creation itself lives outside the generator.
 */
export interface SpawnSink {
  spawn(kind: string, x: number, y: number): void;
}
