import type { Point } from "./types";

/**
 * Axis-aligned rectangle spanning x1..x2 and y1..y2.
 *
 * Built from an origin and a size, so `x2 = x + width`. Room carving
 * treats the x1/x2 columns as the room's outer walls.
 */
export class Rect {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;

  constructor(x: number, y: number, width: number, height: number) {
    this.x1 = x;
    this.y1 = y;
    this.x2 = x + width;
    this.y2 = y + height;
  }

  get width(): number {
    return this.x2 - this.x1;
  }

  get height(): number {
    return this.y2 - this.y1;
  }

  /**
   * Integer midpoint
   */
  center(): Point {
    return {
      x: Math.trunc((this.x1 + this.x2) / 2),
      y: Math.trunc((this.y1 + this.y2) / 2),
    };
  }

  /**
   * Inclusive overlap test. `margin` grows this rect on every side, so
   * a margin of 1 also rejects rects that merely touch.
   */
  intersects(other: Rect, margin = 0): boolean {
    return (
      this.x1 - margin <= other.x2 &&
      this.x2 + margin >= other.x1 &&
      this.y1 - margin <= other.y2 &&
      this.y2 + margin >= other.y1
    );
  }

  contains(p: Point): boolean {
    return p.x >= this.x1 && p.x <= this.x2 && p.y >= this.y1 && p.y <= this.y2;
  }
}
