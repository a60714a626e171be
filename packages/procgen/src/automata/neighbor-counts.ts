import type { TileKind } from "@terrain-sim/contracts";

/**
 * Tally of tile kinds around a cell. Kinds never seen read as zero.
 */
export class NeighborCounts {
  private readonly counts = new Map<TileKind, number>();
  private size = 0;

  add(tile: TileKind): void {
    this.counts.set(tile, (this.counts.get(tile) ?? 0) + 1);
    this.size++;
  }

  get(tile: TileKind): number {
    return this.counts.get(tile) ?? 0;
  }

  /** Number of in-bounds neighbors counted */
  get total(): number {
    return this.size;
  }

  /**
   * Kinds present, in first-seen order.
   */
  entries(): [TileKind, number][] {
    return Array.from(this.counts.entries());
  }

  static fromTiles(tiles: Iterable<TileKind>): NeighborCounts {
    const counts = new NeighborCounts();
    for (const tile of tiles) {
      counts.add(tile);
    }
    return counts;
  }
}
