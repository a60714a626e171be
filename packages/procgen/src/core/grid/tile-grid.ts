/**
 * Resolved terrain grid.
 * Uses flat Int32Array storage in row-major order.
 */

import type { TileKind } from "@terrain-sim/contracts";
import { DIRECTIONS_8, type Dimensions, type Point } from "../geometry/types";
import type { MutableTileGrid, ReadonlyTileGrid } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * 2D grid of tile kinds with neighbor helpers for cellular automata.
 *
 * @remarks
 * The class is mutable so that passes can fill a fresh grid cell by cell.
 * Frames stored in a simulation history are exposed as `ReadonlyTileGrid`
 * and are never written again.
 */
export class TileGrid implements MutableTileGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Int32Array;

  constructor(width: number, height: number, initialValue: TileKind = 0) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Int32Array(width * height);

    if (initialValue !== 0) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Build a grid from rows of tiles. All rows must share the first row's length.
   */
  static fromRows(rows: readonly (readonly TileKind[])[]): TileGrid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    const grid = new TileGrid(width, height);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(
          `Row ${y} has ${row.length} cells, expected ${width}`,
        );
      }
      row.forEach((tile, x) => grid.setUnsafe(x, y, tile));
    });

    return grid;
  }

  /**
   * Wrap a copy of row-major tile data.
   */
  static fromData(width: number, height: number, data: Int32Array): TileGrid {
    if (data.length !== width * height) {
      throw new Error(
        `Expected ${width * height} cells for ${width}x${height}, got ${data.length}`,
      );
    }
    const grid = new TileGrid(width, height);
    grid.data.set(data);
    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(x: number, y: number): TileKind | undefined {
    if (!this.isInBounds(x, y)) return undefined;
    return this.data[y * this.width + x];
  }

  getAt(p: Point): TileKind | undefined {
    return this.get(p.x, p.y);
  }

  /**
   * Set cell value; out-of-bounds writes are dropped
   */
  set(x: number, y: number, tile: TileKind): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = tile;
  }

  setAt(p: Point, tile: TileKind): void {
    this.set(p.x, p.y, tile);
  }

  /**
   * Unsafe get (no bounds check) - use only when bounds are guaranteed
   */
  getUnsafe(x: number, y: number): TileKind {
    return this.data[y * this.width + x] ?? 0;
  }

  /**
   * Unsafe set (no bounds check) - use only when bounds are guaranteed
   */
  setUnsafe(x: number, y: number, tile: TileKind): void {
    this.data[y * this.width + x] = tile;
  }

  fill(tile: TileKind): void {
    this.data.fill(tile);
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Iterate over in-bounds 8-directional neighbors without allocation.
   * Corners see 3 neighbors, edges 5, interior cells 8; there is no wraparound.
   */
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, tile: TileKind) => void,
  ): void {
    const minX = Math.max(0, x - 1);
    const maxX = Math.min(this.width - 1, x + 1);
    const minY = Math.max(0, y - 1);
    const maxY = Math.min(this.height - 1, y + 1);

    for (let ny = minY; ny <= maxY; ny++) {
      for (let nx = minX; nx <= maxX; nx++) {
        if (nx !== x || ny !== y) {
          callback(nx, ny, this.getUnsafe(nx, ny));
        }
      }
    }
  }

  getNeighbors8(x: number, y: number): Point[] {
    const neighbors: Point[] = [];

    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (this.isInBounds(nx, ny)) {
        neighbors.push({ x: nx, y: ny });
      }
    }

    return neighbors;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): TileGrid {
    return TileGrid.fromData(this.width, this.height, this.data);
  }

  /**
   * Copy of the row-major cell data, safe to hand to renderers.
   */
  getRawDataCopy(): Int32Array {
    return new Int32Array(this.data);
  }

  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  forEach(callback: (x: number, y: number, tile: TileKind) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.getUnsafe(x, y));
      }
    }
  }

  countCells(tile: TileKind): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === tile) count++;
    }
    return count;
  }

  equals(other: ReadonlyTileGrid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getUnsafe(x, y) !== other.getUnsafe(x, y)) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Tiles of one row, or empty if out of bounds.
   */
  getRow(y: number): TileKind[] {
    if (y < 0 || y >= this.height) return [];
    return Array.from(
      this.data.subarray(y * this.width, (y + 1) * this.width),
    );
  }

  toRows(): TileKind[][] {
    const rows: TileKind[][] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(this.getRow(y));
    }
    return rows;
  }
}
