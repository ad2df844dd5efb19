/**
 * Cellular Automata Constants
 */

/** Interior tiles start as floor when a d100 roll exceeds this */
export const FLOOR_ROLL_THRESHOLD = 55;

/** Smoothing passes over the noise */
export const SMOOTHING_PASSES = 15;

/** A tile becomes wall when more of its 8 neighbours than this are wall */
export const WALL_NEIGHBOUR_LIMIT = 4;
