/**
 * Dijkstra Map Implementation
 *
 * Stores the cost of the cheapest 8-directional path from a set of goal
 * tiles to every other tile. Used for reachability pruning and for
 * picking the exit as far from the start as the level allows.
 *
 * @see https://www.roguebasin.com/index.php/The_Incredible_Power_of_Dijkstra_Maps
 */

import { DIAGONAL_COST, MAX_PRUNE_COST, ORTHOGONAL_COST } from "../constants";
import { IndexMinHeap } from "../data-structures/min-heap";
import { DIRECTIONS_8 } from "../geometry/types";
import type { Grid } from "../grid/grid";

/**
 * Distance field over a grid. Unreached tiles hold Infinity.
 */
export class DijkstraMap {
  readonly width: number;
  readonly height: number;
  private readonly distances: Float64Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.distances = new Float64Array(width * height).fill(Infinity);
  }

  /**
   * Build a map from `starts` over the grid's unblocked tiles.
   *
   * Reads `grid.blocked` as-is; call `populateBlocked()` first when the
   * tiles have changed. Expansion stops at `maxCost`: tiles whose
   * cheapest path costs more stay at Infinity.
   */
  static compute(
    grid: Grid,
    starts: readonly number[],
    maxCost: number = MAX_PRUNE_COST,
  ): DijkstraMap {
    const map = new DijkstraMap(grid.width, grid.height);
    const dist = map.distances;
    const heap = new IndexMinHeap();

    for (const start of starts) {
      dist[start] = 0;
      heap.push(start, 0);
    }

    while (!heap.isEmpty) {
      const entry = heap.pop();
      if (entry === undefined) break;
      const { key: current, priority } = entry;
      if (priority > dist[current]) continue;

      const cx = current % grid.width;
      const cy = Math.floor(current / grid.width);

      for (const dir of DIRECTIONS_8) {
        const nx = cx + dir.x;
        const ny = cy + dir.y;
        if (!grid.isInBounds(nx, ny)) continue;

        const next = ny * grid.width + nx;
        if (grid.blocked[next]) continue;

        const step = dir.x !== 0 && dir.y !== 0 ? DIAGONAL_COST : ORTHOGONAL_COST;
        const cost = priority + step;
        if (cost > maxCost || cost >= dist[next]) continue;

        dist[next] = cost;
        heap.push(next, cost);
      }
    }

    return map;
  }

  /**
   * Distance at a position, Infinity for out-of-bounds or unreached tiles.
   */
  get(x: number, y: number): number {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return Infinity;
    return this.distances[y * this.width + x];
  }

  getAt(index: number): number {
    return this.distances[index] ?? Infinity;
  }

  isReachable(index: number): boolean {
    return this.getAt(index) !== Infinity;
  }

  /**
   * Reachable tile with the greatest distance among those accepted by
   * `filter`. The lowest index wins ties.
   */
  findFurthest(
    filter: (index: number) => boolean = () => true,
  ): { index: number; distance: number } | null {
    let best: { index: number; distance: number } | null = null;

    for (let i = 0; i < this.distances.length; i++) {
      const d = this.distances[i];
      if (d === Infinity || !filter(i)) continue;
      if (best === null || d > best.distance) {
        best = { index: i, distance: d };
      }
    }

    return best;
  }

  getStats(): DijkstraMapStats {
    let max = -Infinity;
    let sum = 0;
    let count = 0;

    for (const d of this.distances) {
      if (d !== Infinity) {
        max = Math.max(max, d);
        sum += d;
        count++;
      }
    }

    return {
      maxDistance: count > 0 ? max : 0,
      avgDistance: count > 0 ? sum / count : 0,
      reachableCells: count,
      unreachableCells: this.distances.length - count,
    };
  }
}

/**
 * Statistics about a Dijkstra map
 */
export interface DijkstraMapStats {
  readonly maxDistance: number;
  readonly avgDistance: number;
  readonly reachableCells: number;
  readonly unreachableCells: number;
}
