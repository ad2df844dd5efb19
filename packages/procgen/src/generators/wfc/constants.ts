/**
 * Wave Function Collapse Constants
 */

/** Side length of a chunk in tiles */
export const DEFAULT_CHUNK_SIZE = 8;

/** Fresh solver runs before giving up on a source map */
export const DEFAULT_MAX_SOLVER_ATTEMPTS = 100;

/** Chunk sides, in the order exits and compatibility lists use */
export const Side = {
  NORTH: 0,
  SOUTH: 1,
  WEST: 2,
  EAST: 3,
} as const;

export type Side = (typeof Side)[keyof typeof Side];

export const SIDES: readonly Side[] = [Side.NORTH, Side.SOUTH, Side.WEST, Side.EAST];

export function oppositeSide(side: Side): Side {
  switch (side) {
    case Side.NORTH:
      return Side.SOUTH;
    case Side.SOUTH:
      return Side.NORTH;
    case Side.WEST:
      return Side.EAST;
    case Side.EAST:
      return Side.WEST;
  }
}
