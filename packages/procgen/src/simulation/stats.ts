import { TerrainError, type TileKind } from "@terrain-sim/contracts";
import type { ReadonlyTileGrid } from "../core/grid/types";

/**
 * Tile statistics for analyzing a terrain frame
 */
export interface TerrainStats {
  readonly cellCount: number;
  /** Cells per tile kind, in first-seen row-major order */
  readonly tileCounts: ReadonlyMap<TileKind, number>;
  /** Fraction of cells per tile kind */
  readonly coverage: ReadonlyMap<TileKind, number>;
  /** Most common tile; earliest seen wins ties */
  readonly dominantTile: TileKind | undefined;
}

export function computeTerrainStats(grid: ReadonlyTileGrid): TerrainStats {
  const tileCounts = new Map<TileKind, number>();
  grid.forEach((_x, _y, tile) => {
    tileCounts.set(tile, (tileCounts.get(tile) ?? 0) + 1);
  });

  const cellCount = grid.width * grid.height;
  const coverage = new Map<TileKind, number>();
  let dominantTile: TileKind | undefined;
  let dominantCount = 0;

  for (const [tile, count] of tileCounts) {
    coverage.set(tile, count / cellCount);
    if (count > dominantCount) {
      dominantTile = tile;
      dominantCount = count;
    }
  }

  return { cellCount, tileCounts, coverage, dominantTile };
}

/**
 * Number of cells whose tile differs between two same-sized frames.
 *
 * @throws {TerrainError} INVALID_ARGUMENT when the dimensions differ
 */
export function countChangedCells(
  before: ReadonlyTileGrid,
  after: ReadonlyTileGrid,
): number {
  if (before.width !== after.width || before.height !== after.height) {
    throw TerrainError.invalidArgument(
      `Cannot compare ${before.width}x${before.height} with ${after.width}x${after.height}`,
    );
  }

  let changed = 0;
  before.forEach((x, y, tile) => {
    if (after.getUnsafe(x, y) !== tile) changed++;
  });
  return changed;
}
