export { bresenhamLine } from "./line";
export { Rect } from "./rect";
export type { Dimensions, Point } from "./types";
export { DIRECTIONS_8 } from "./types";
