/**
 * Core Constants
 *
 * Named constants shared by the connectivity and region modules.
 */

// =============================================================================
// PATHFINDING
// =============================================================================

/** Diagonal movement cost (√2 ≈ 1.414) */
export const DIAGONAL_COST = Math.SQRT2;

/** Orthogonal (cardinal) movement cost */
export const ORTHOGONAL_COST = 1;

/** Accumulated cost beyond which reachability pruning stops expanding */
export const MAX_PRUNE_COST = 200;

// =============================================================================
// REGIONS
// =============================================================================

/** Frequency of the cellular noise used to bucket floor tiles */
export const REGION_NOISE_FREQUENCY = 0.08;

/** Multiplier applied to a noise sample before truncating it to a bucket id */
export const REGION_BUCKET_SCALE = 10240;

/** Noise seeds are drawn as 1d65536 */
export const REGION_NOISE_SEED_SIDES = 65536;
