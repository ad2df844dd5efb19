/**
 * Level grid: flat Uint8Array tile storage plus the per-tile flags the
 * game runtime reads once a level is handed over.
 */

import { TileKind } from "@descent/contracts";
import { DIRECTIONS_8, type Dimensions, type Point } from "../geometry/types";

/** Byte value to tile kind; byte values equal the TileKind codes. */
const TILE_BY_CODE: readonly TileKind[] = [
  TileKind.VOID,
  TileKind.PLACEHOLDER,
  TileKind.WALL,
  TileKind.FLOOR,
  TileKind.STAIRS_DOWN,
];

/**
 * Tile grid for one dungeon level.
 *
 * @remarks
 * Tiles are mutated in place by the strategy that owns the grid during
 * `build()`. Everything handed out of a strategy is a copy, see
 * `clone()` and `finalize()`.
 *
 * `tileContent` is the runtime's per-tile occupant list. Generation
 * never reads it and copies start with empty lists.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  readonly revealed: boolean[];
  readonly visible: boolean[];
  readonly blocked: boolean[];
  readonly tileContent: number[][];
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    depth = 1,
    fill: TileKind = TileKind.VOID,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid grid dimensions: ${width}x${height}`);
    }
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Invalid grid depth: ${depth}`);
    }

    this.width = width;
    this.height = height;
    this.depth = depth;

    const size = width * height;
    this.data = new Uint8Array(size);
    if (fill !== TileKind.VOID) {
      this.data.fill(fill);
    }
    this.revealed = new Array<boolean>(size).fill(false);
    this.visible = new Array<boolean>(size).fill(false);
    this.blocked = new Array<boolean>(size).fill(false);
    this.tileContent = Array.from({ length: size }, () => []);
  }

  static create(
    dim: Dimensions,
    depth = 1,
    fill: TileKind = TileKind.VOID,
  ): Grid {
    return new Grid(dim.width, dim.height, depth, fill);
  }

  /**
   * Build a grid from rows of tile kinds. Rows must share one length.
   */
  static fromRows(rows: readonly (readonly TileKind[])[], depth = 1): Grid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    const grid = new Grid(width, height, depth);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new RangeError(`Row ${y} has ${row.length} tiles, expected ${width}`);
      }
      row.forEach((kind, x) => grid.set(x, y, kind));
    });
    return grid;
  }

  /** Number of tiles (width * height) */
  get size(): number {
    return this.data.length;
  }

  // ===========================================================================
  // INDEXING
  // ===========================================================================

  index(x: number, y: number): number {
    return y * this.width + x;
  }

  toPoint(index: number): Point {
    return { x: index % this.width, y: Math.floor(index / this.width) };
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  containsPoint(p: Point): boolean {
    return this.isInBounds(p.x, p.y);
  }

  center(): Point {
    return { x: Math.trunc(this.width / 2), y: Math.trunc(this.height / 2) };
  }

  // ===========================================================================
  // TILE ACCESS
  // ===========================================================================

  /**
   * Tile at (x, y). Reads outside the grid see WALL, which keeps
   * neighbour scans free of bounds checks.
   */
  get(x: number, y: number): TileKind {
    if (!this.isInBounds(x, y)) return TileKind.WALL;
    return TILE_BY_CODE[this.data[y * this.width + x]];
  }

  getAt(index: number): TileKind {
    this.assertIndex(index);
    return TILE_BY_CODE[this.data[index]];
  }

  set(x: number, y: number, kind: TileKind): void {
    if (!this.isInBounds(x, y)) {
      throw new RangeError(`Tile (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    this.data[y * this.width + x] = kind;
  }

  setAt(index: number, kind: TileKind): void {
    this.assertIndex(index);
    this.data[index] = kind;
  }

  /**
   * Tile kinds in row-major order
   */
  tiles(): TileKind[] {
    return Array.from(this.data, (code) => TILE_BY_CODE[code]);
  }

  fill(kind: TileKind): void {
    this.data.fill(kind);
  }

  /**
   * Fill the inclusive rectangle (x1, y1)..(x2, y2), clipped to the grid
   */
  fillRect(x1: number, y1: number, x2: number, y2: number, kind: TileKind): void {
    const minX = Math.max(0, x1);
    const maxX = Math.min(this.width - 1, x2);
    const minY = Math.max(0, y1);
    const maxY = Math.min(this.height - 1, y2);
    for (let y = minY; y <= maxY; y++) {
      const row = y * this.width;
      this.data.fill(kind, row + minX, row + maxX + 1);
    }
  }

  isVoidOrWall(x: number, y: number): boolean {
    const kind = this.get(x, y);
    return kind === TileKind.VOID || kind === TileKind.WALL;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  count(kind: TileKind): number {
    let total = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === kind) total++;
    }
    return total;
  }

  /**
   * Indices of every tile of the given kind, ascending
   */
  findAll(kind: TileKind): number[] {
    const found: number[] = [];
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === kind) found.push(i);
    }
    return found;
  }

  /**
   * Replace every `from` tile with `to`; returns the number replaced
   */
  replaceAll(from: TileKind, to: TileKind): number {
    let replaced = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === from) {
        this.data[i] = to;
        replaced++;
      }
    }
    return replaced;
  }

  /**
   * Count the 8-neighbours of (x, y) holding `kind`; outside tiles read
   * as WALL.
   */
  countNeighbors8(x: number, y: number, kind: TileKind): number {
    let total = 0;
    for (const dir of DIRECTIONS_8) {
      if (this.get(x + dir.x, y + dir.y) === kind) total++;
    }
    return total;
  }

  // ===========================================================================
  // RUNTIME FLAGS
  // ===========================================================================

  /**
   * Recompute `blocked`: WALL and VOID block movement.
   */
  populateBlocked(): void {
    for (let i = 0; i < this.data.length; i++) {
      const code = this.data[i];
      this.blocked[i] = code === TileKind.WALL || code === TileKind.VOID;
    }
  }

  // ===========================================================================
  // COPIES
  // ===========================================================================

  /**
   * Independent copy of tiles and flags. Occupant lists start empty.
   */
  clone(): Grid {
    const copy = new Grid(this.width, this.height, this.depth);
    copy.data.set(this.data);
    for (let i = 0; i < this.data.length; i++) {
      copy.revealed[i] = this.revealed[i];
      copy.visible[i] = this.visible[i];
      copy.blocked[i] = this.blocked[i];
    }
    return copy;
  }

  /**
   * Copy with every tile revealed and visible, as handed to snapshot
   * observers.
   */
  snapshot(): Grid {
    const copy = this.clone();
    copy.revealed.fill(true);
    copy.visible.fill(true);
    return copy;
  }

  /**
   * Copy as handed to the runtime: nothing revealed or visible yet,
   * `blocked` derived from the tiles.
   */
  finalize(): Grid {
    const copy = new Grid(this.width, this.height, this.depth);
    copy.data.set(this.data);
    copy.populateBlocked();
    return copy;
  }

  equals(other: Grid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw new RangeError(`Tile index ${index} is outside 0..${this.data.length - 1}`);
    }
  }
}
