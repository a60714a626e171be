/**
 * Core geometry types for grid processing.
 */

import type { Direction } from "@terrain-sim/contracts";

/**
 * 2D point with integer coordinates. `y` grows downwards (row index).
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Unit offsets for the four cardinal directions.
 */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, Point>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/** Inverse of each direction; rule tables are never symmetrized with it */
export const OPPOSITE_DIRECTION: Readonly<Record<Direction, Direction>> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

/**
 * Offsets of the 8-neighborhood, in row-major order.
 */
export const DIRECTIONS_8 = [
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
  { x: -1, y: 0 }, // W
  { x: 1, y: 0 }, // E
  { x: -1, y: 1 }, // SW
  { x: 0, y: 1 }, // S
  { x: 1, y: 1 }, // SE
] as const;
