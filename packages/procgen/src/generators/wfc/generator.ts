/**
 * WFC-Derived Generator
 *
 * Re-synthesises a level built by another strategy: the source map is
 * cut into chunks and a new map is assembled from chunks whose edges
 * line up.
 */

import { TileKind } from "@descent/contracts";
import type { Grid } from "../../core/grid/grid";
import { findStartWalkingLeft } from "../../passes/connectivity/reachability";
import { BaseMapStrategy, type StrategyContext } from "../base/map-strategy";
import { WFC_STRATEGY_ID } from "../strategy-ids";
import { DEFAULT_CHUNK_SIZE, DEFAULT_MAX_SOLVER_ATTEMPTS } from "./constants";
import { buildPatterns, patternsToConstraints } from "./patterns";
import { solveChunks } from "./solver";

export interface WfcOptions {
  chunkSize?: number;
  maxSolverAttempts?: number;
}

export class WfcDerivedGenerator extends BaseMapStrategy {
  readonly id = WFC_STRATEGY_ID;
  readonly name = "Wave Function Collapse";

  private readonly chunkSize: number;
  private readonly maxSolverAttempts: number;

  constructor(
    context: StrategyContext,
    private readonly source: Grid,
    options: WfcOptions = {},
  ) {
    super(context);
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.maxSolverAttempts = options.maxSolverAttempts ?? DEFAULT_MAX_SOLVER_ATTEMPTS;
  }

  protected generate(): void {
    const source = this.source.clone();
    source.replaceAll(TileKind.STAIRS_DOWN, TileKind.FLOOR);

    const patterns = buildPatterns(source, this.chunkSize, true, true);
    const constraints = patternsToConstraints(patterns, this.chunkSize);
    this.logger.debug(
      { strategy: this.id, patterns: patterns.length, chunkSize: this.chunkSize },
      "Extracted patterns",
    );

    solveChunks(constraints, this.chunkSize, this.grid, this.rng, this.maxSolverAttempts, () =>
      this.takeSnapshot(),
    );

    this.finishWithPruning(findStartWalkingLeft(this.grid));
  }
}
