/**
 * BSP Dungeon Constants
 */

/** Placement attempts, successful or not */
export const MAX_PLACEMENT_ATTEMPTS = 240;

/** Upper bound fed to the room size roll */
export const MAX_ROOM_ROLL = 10;

/** Smallest room size before the +1 adjustment */
export const MIN_ROOM_ROLL = 3;

/** Rooms are offset by 0..5 tiles inside their partition */
export const ROOM_OFFSET_SIDES = 6;

/** Outer margin of the first partition */
export const LEVEL_MARGIN = 2;
