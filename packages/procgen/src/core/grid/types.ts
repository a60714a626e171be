/**
 * Grid interfaces for resolved terrain.
 */

import type { TileKind } from "@terrain-sim/contracts";
import type { Dimensions, Point } from "../geometry/types";

/**
 * Read-only view of a resolved terrain grid.
 *
 * Simulation frames are handed out through this type: a frame is a snapshot
 * and must not change once produced.
 *
 * @example
 * ```typescript
 * function countWater(grid: ReadonlyTileGrid): number {
 *   return grid.countCells(BaseTile.WATER);
 * }
 * ```
 */
export interface ReadonlyTileGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;

  /** `undefined` outside the grid */
  get(x: number, y: number): TileKind | undefined;
  getAt(p: Point): TileKind | undefined;
  getUnsafe(x: number, y: number): TileKind;

  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, tile: TileKind) => void,
  ): void;
  getNeighbors8(x: number, y: number): Point[];

  /** Row-major iteration */
  forEach(callback: (x: number, y: number, tile: TileKind) => void): void;
  countCells(tile: TileKind): number;
  getRow(y: number): TileKind[];
  toRows(): TileKind[][];
  getRawDataCopy(): Int32Array;
  getDimensions(): Dimensions;
  equals(other: ReadonlyTileGrid): boolean;
  clone(): MutableTileGrid;
}

/**
 * Mutable grid used while a frame is being built.
 */
export interface MutableTileGrid extends ReadonlyTileGrid {
  set(x: number, y: number, tile: TileKind): void;
  setAt(p: Point, tile: TileKind): void;
  setUnsafe(x: number, y: number, tile: TileKind): void;
  fill(tile: TileKind): void;
}
