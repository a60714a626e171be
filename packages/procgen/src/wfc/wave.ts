/**
 * Wave state: one candidate bitset per cell plus the uncollapsed flags.
 *
 * Bit `i` of a cell's set stands for `tiles[i]`, so candidate enumeration
 * always follows universe order.
 */

import type { TileKind } from "@terrain-sim/contracts";

export function wordCount(tileCount: number): number {
  return (tileCount + 31) >>> 5;
}

export function countBits32(value: number): number {
  let x = value - ((value >>> 1) & 0x55555555);
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  return (((x + (x >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

/**
 * Index [0..31] of the lowest set bit.
 */
export function lowestBitIndex(value: number): number {
  return 31 - Math.clz32(value & -value);
}

/**
 * Bitset with every tile of the universe set.
 */
export function fullMask(tileCount: number): Uint32Array {
  const words = wordCount(tileCount);
  const mask = new Uint32Array(words).fill(0xffffffff);
  const extra = words * 32 - tileCount;
  if (extra > 0) {
    mask[words - 1] = 0xffffffff >>> extra;
  }
  return mask;
}

export class Wave {
  readonly width: number;
  readonly height: number;
  readonly cellCount: number;
  readonly words: number;
  readonly tiles: readonly TileKind[];

  private readonly domain: Uint32Array;
  private readonly counts: Int32Array;
  private readonly uncollapsed: Uint8Array;
  private remaining: number;

  constructor(width: number, height: number, tiles: readonly TileKind[]) {
    this.width = width;
    this.height = height;
    this.cellCount = width * height;
    this.tiles = tiles;
    this.words = wordCount(tiles.length);

    const full = fullMask(tiles.length);
    this.domain = new Uint32Array(this.cellCount * this.words);
    for (let cell = 0; cell < this.cellCount; cell++) {
      this.domain.set(full, cell * this.words);
    }

    this.counts = new Int32Array(this.cellCount).fill(tiles.length);
    this.uncollapsed = new Uint8Array(this.cellCount).fill(1);
    this.remaining = this.cellCount;
  }

  /** Cells still flagged uncollapsed */
  get remainingCount(): number {
    return this.remaining;
  }

  count(cell: number): number {
    return this.counts[cell] ?? 0;
  }

  /** Candidate count minus one; zero once collapsed */
  entropy(cell: number): number {
    return this.count(cell) - 1;
  }

  isUncollapsed(cell: number): boolean {
    return this.uncollapsed[cell] === 1;
  }

  markCollapsed(cell: number): void {
    if (this.uncollapsed[cell] === 1) {
      this.uncollapsed[cell] = 0;
      this.remaining--;
    }
  }

  /**
   * Universe indices of the cell's candidates, ascending.
   */
  candidateIndices(cell: number): number[] {
    const out: number[] = [];
    const base = cell * this.words;
    for (let w = 0; w < this.words; w++) {
      let bits = this.domain[base + w] ?? 0;
      while (bits !== 0) {
        out.push(w * 32 + lowestBitIndex(bits));
        bits &= bits - 1;
      }
    }
    return out;
  }

  candidates(cell: number): TileKind[] {
    return this.candidateIndices(cell).map((i) => this.tiles[i] ?? 0);
  }

  /**
   * Size of `candidates(cell) ∩ mask` without modifying the cell.
   */
  intersectionCount(cell: number, mask: Uint32Array): number {
    const base = cell * this.words;
    let total = 0;
    for (let w = 0; w < this.words; w++) {
      total += countBits32((this.domain[base + w] ?? 0) & (mask[w] ?? 0));
    }
    return total;
  }

  /**
   * Restrict the cell to `candidates(cell) ∩ mask`. Callers check the
   * intersection is non-empty first.
   */
  restrict(cell: number, mask: Uint32Array): number {
    const base = cell * this.words;
    let total = 0;
    for (let w = 0; w < this.words; w++) {
      const next = (this.domain[base + w] ?? 0) & (mask[w] ?? 0);
      this.domain[base + w] = next;
      total += countBits32(next);
    }
    this.counts[cell] = total;
    return total;
  }

  /**
   * Reduce the cell to the single tile at universe index `tileIndex`.
   */
  collapseTo(cell: number, tileIndex: number): void {
    const base = cell * this.words;
    this.domain.fill(0, base, base + this.words);
    this.domain[base + (tileIndex >>> 5)] = (1 << (tileIndex & 31)) >>> 0;
    this.counts[cell] = 1;
  }

  /**
   * OR `masks[i]` into `out` for every candidate `i` of the cell.
   */
  unionInto(
    cell: number,
    masks: readonly Uint32Array[],
    out: Uint32Array,
  ): void {
    out.fill(0);
    const base = cell * this.words;
    for (let w = 0; w < this.words; w++) {
      let bits = this.domain[base + w] ?? 0;
      while (bits !== 0) {
        const mask = masks[w * 32 + lowestBitIndex(bits)];
        bits &= bits - 1;
        if (!mask) continue;
        for (let k = 0; k < this.words; k++) {
          out[k] = (out[k] ?? 0) | (mask[k] ?? 0);
        }
      }
    }
  }

  /**
   * Resolved tile of a single-candidate cell.
   */
  resolvedTile(cell: number): TileKind | undefined {
    const [index] = this.candidateIndices(cell);
    return index === undefined ? undefined : this.tiles[index];
  }
}
