/**
 * Terrain checksums.
 *
 * Used to compare simulation runs for determinism. Checksums carry a
 * version prefix ("v{version}:{hash}") so the hashed layout can change
 * without silently matching older values.
 */

import type { ReadonlyTileGrid } from "../grid/types";
import { createFNV64Hasher, type FNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

function hashGrid(hasher: FNV64Hasher, grid: ReadonlyTileGrid): void {
  hasher.updateInt32(grid.width);
  hasher.updateInt32(grid.height);
  hasher.updateInt32Array(grid.getRawDataCopy());
}

/**
 * Checksum of a single grid: dimensions, then cells in row-major order.
 */
export function calculateGridChecksum(grid: ReadonlyTileGrid): string {
  const hasher = createFNV64Hasher();
  hashGrid(hasher, grid);
  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}

/**
 * Checksum of an ordered sequence of frames. Frame order is significant.
 */
export function calculateFramesChecksum(
  frames: readonly ReadonlyTileGrid[],
): string {
  const hasher = createFNV64Hasher();
  hasher.updateInt32(frames.length);
  for (const frame of frames) {
    hashGrid(hasher, frame);
  }
  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
