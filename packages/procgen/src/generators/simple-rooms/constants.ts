/**
 * Simple Rooms Constants
 */

/** Placement attempts; rejected rooms are not retried */
export const MAX_ROOM_ATTEMPTS = 30;

/** Smallest room width/height (inclusive) */
export const MIN_ROOM_SIZE = 6;

/** Largest room width/height (inclusive) */
export const MAX_ROOM_SIZE = 9;
