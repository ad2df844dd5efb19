/**
 * Core geometry types for level generation.
 */

import type { Position } from "@descent/contracts";

/**
 * 2D point with integer coordinates
 */
export type Point = Position;

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Neighbour offsets, clockwise from north
 */
export const DIRECTIONS_8 = [
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: 0 },
  { x: -1, y: -1 },
] as const;
