/**
 * Wave function collapse solver.
 *
 * Repeatedly collapses the lowest-entropy uncollapsed cell and propagates
 * adjacency constraints breadth-first. There is no backtracking: when a
 * neighbor runs out of candidates it is forced to one of its previous
 * candidates, which can leave a rule violation on that edge.
 */

import {
  DIRECTIONS,
  type Direction,
  type RandomSource,
  type TileKind,
  TerrainError,
} from "@terrain-sim/contracts";
import { FastQueue } from "../core/data-structures/fast-queue";
import { MinHeap } from "../core/data-structures/min-heap";
import { DIRECTION_OFFSETS, type Point } from "../core/geometry/types";
import { TileGrid } from "../core/grid/tile-grid";
import type { AdjacencyRuleTable } from "./adjacency";
import { fullMask, Wave, wordCount } from "./wave";

export interface WaveStats {
  /** Cells collapsed by selection */
  readonly collapses: number;
  /** Cells dequeued during propagation */
  readonly propagations: number;
  /** Neighbors left without a consistent candidate */
  readonly contradictions: number;
  /** Contradictions repaired by forcing a random prior candidate */
  readonly forcedCollapses: number;
}

export interface ContradictionEvent {
  /** Cell whose candidates ran out */
  readonly cell: Point;
  /** Cell being propagated from */
  readonly source: Point;
  /** Direction from `source` to `cell` */
  readonly direction: Direction;
  /** Tile the cell was forced to, or kept if it was already resolved */
  readonly tile: TileKind;
  readonly forced: boolean;
}

export interface WfcSolverOptions {
  /** Called for every contradiction met during propagation */
  readonly onContradiction?: (event: ContradictionEvent) => void;
}

export interface WaveResult {
  readonly grid: TileGrid;
  readonly stats: WaveStats;
}

interface MutableWaveStats {
  collapses: number;
  propagations: number;
  contradictions: number;
  forcedCollapses: number;
}

interface HeapEntry {
  readonly count: number;
  readonly cell: number;
}

/**
 * Row-major tie-break: among equal candidate counts the lower index wins.
 */
function compareEntries(a: HeapEntry, b: HeapEntry): number {
  return a.count - b.count || a.cell - b.cell;
}

/**
 * Per-direction allowed-neighbor bitsets, indexed by universe position.
 */
type DirectionMasks = Readonly<Record<Direction, readonly Uint32Array[]>>;

function buildDirectionMasks(
  tiles: readonly TileKind[],
  rules: AdjacencyRuleTable,
): DirectionMasks {
  const words = wordCount(tiles.length);
  const full = fullMask(tiles.length);

  const forDirection = (direction: Direction): Uint32Array[] =>
    tiles.map((tile) => {
      if (!rules.hasEntry(tile, direction)) {
        return new Uint32Array(full);
      }
      const allowed = rules.allowedNeighbors(tile, direction);
      const mask = new Uint32Array(words);
      tiles.forEach((candidate, index) => {
        if (allowed.has(candidate)) {
          mask[index >>> 5] = ((mask[index >>> 5] ?? 0) | (1 << (index & 31))) >>> 0;
        }
      });
      return mask;
    });

  return {
    up: forDirection("up"),
    down: forDirection("down"),
    left: forDirection("left"),
    right: forDirection("right"),
  };
}

function validateArguments(
  width: number,
  height: number,
  universe: readonly TileKind[],
): readonly TileKind[] {
  if (!Number.isInteger(width) || width <= 0) {
    throw TerrainError.invalidArgument(
      `Grid width must be a positive integer, got ${width}`,
      { width },
    );
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw TerrainError.invalidArgument(
      `Grid height must be a positive integer, got ${height}`,
      { height },
    );
  }
  if (universe.length === 0) {
    throw TerrainError.invalidArgument("Tile universe cannot be empty");
  }
  const invalid = universe.find((tile) => !Number.isInteger(tile));
  if (invalid !== undefined) {
    throw TerrainError.invalidArgument(`Invalid tile kind ${invalid}`, {
      tile: invalid,
    });
  }
  return Array.from(new Set(universe));
}

export class WfcSolver {
  private readonly onContradiction:
    | ((event: ContradictionEvent) => void)
    | undefined;

  constructor(options: WfcSolverOptions = {}) {
    this.onContradiction = options.onContradiction;
  }

  /**
   * Produce a fully resolved grid.
   *
   * @throws {TerrainError} INVALID_ARGUMENT for non-positive dimensions or
   *   an empty universe
   */
  generate(
    width: number,
    height: number,
    universe: readonly TileKind[],
    rules: AdjacencyRuleTable,
    random: RandomSource,
  ): TileGrid {
    return this.solve(width, height, universe, rules, random).grid;
  }

  /**
   * Like {@link generate}, also returning solver statistics.
   */
  solve(
    width: number,
    height: number,
    universe: readonly TileKind[],
    rules: AdjacencyRuleTable,
    random: RandomSource,
  ): WaveResult {
    const tiles = validateArguments(width, height, universe);
    const wave = new Wave(width, height, tiles);
    const masks = buildDirectionMasks(tiles, rules);
    const stats: MutableWaveStats = {
      collapses: 0,
      propagations: 0,
      contradictions: 0,
      forcedCollapses: 0,
    };

    // Entries go stale when a cell shrinks or collapses; stale ones are
    // skipped on pop, so the first live entry is the row-major-first minimum.
    const heap = new MinHeap<HeapEntry>(compareEntries);
    for (let cell = 0; cell < wave.cellCount; cell++) {
      heap.push({ count: wave.count(cell), cell });
    }

    while (wave.remainingCount > 0) {
      const cell = this.selectCell(wave, heap);
      if (cell === undefined) {
        throw TerrainError.generationFailed(
          "Selection found no uncollapsed cell while cells remained",
          { remaining: wave.remainingCount },
        );
      }

      const options = wave.candidateIndices(cell);
      const chosen = options[random.range(0, options.length - 1)] ?? 0;
      wave.collapseTo(cell, chosen);
      wave.markCollapsed(cell);
      stats.collapses++;

      this.propagate(wave, masks, cell, random, heap, stats);
    }

    const grid = new TileGrid(width, height);
    for (let cell = 0; cell < wave.cellCount; cell++) {
      grid.setUnsafe(cell % width, Math.floor(cell / width), wave.resolvedTile(cell) ?? 0);
    }

    return { grid, stats };
  }

  private selectCell(wave: Wave, heap: MinHeap<HeapEntry>): number | undefined {
    let entry = heap.pop();
    while (entry) {
      if (wave.isUncollapsed(entry.cell) && wave.count(entry.cell) === entry.count) {
        return entry.cell;
      }
      entry = heap.pop();
    }
    return undefined;
  }

  /**
   * Breadth-first constraint propagation from `seed`.
   *
   * A cell is only enqueued when its candidate set strictly shrinks, which
   * bounds the total work and guarantees the loop ends.
   */
  private propagate(
    wave: Wave,
    masks: DirectionMasks,
    seed: number,
    random: RandomSource,
    heap: MinHeap<HeapEntry>,
    stats: MutableWaveStats,
  ): void {
    const width = wave.width;
    const allowed = new Uint32Array(wave.words);
    const queue = new FastQueue<number>();
    queue.enqueue(seed);

    let current = queue.dequeue();
    while (current !== undefined) {
      stats.propagations++;
      const x = current % width;
      const y = Math.floor(current / width);

      for (const direction of DIRECTIONS) {
        const offset = DIRECTION_OFFSETS[direction];
        const nx = x + offset.x;
        const ny = y + offset.y;
        if (nx < 0 || ny < 0 || nx >= width || ny >= wave.height) continue;

        const neighbor = ny * width + nx;
        wave.unionInto(current, masks[direction], allowed);

        const before = wave.count(neighbor);
        const after = wave.intersectionCount(neighbor, allowed);

        if (after === 0) {
          stats.contradictions++;
          const forced = before > 1;
          if (forced) {
            const options = wave.candidateIndices(neighbor);
            wave.collapseTo(neighbor, options[random.range(0, options.length - 1)] ?? 0);
            wave.markCollapsed(neighbor);
            stats.forcedCollapses++;
            queue.enqueue(neighbor);
          }
          this.onContradiction?.({
            cell: { x: nx, y: ny },
            source: { x, y },
            direction,
            tile: wave.resolvedTile(neighbor) ?? 0,
            forced,
          });
          continue;
        }

        if (after < before) {
          wave.restrict(neighbor, allowed);
          queue.enqueue(neighbor);
          if (after === 1) {
            wave.markCollapsed(neighbor);
          } else if (wave.isUncollapsed(neighbor)) {
            heap.push({ count: after, cell: neighbor });
          }
        }
      }

      current = queue.dequeue();
    }
  }
}
