/**
 * Cellular automaton over a resolved terrain grid.
 *
 * Rules are kept in insertion order. Lookup prefers exact-tile rules over
 * wildcards and, within each kind, the most recently added rule.
 */

import { TerrainError, type TileKind } from "@terrain-sim/contracts";
import { TileGrid } from "../core/grid/tile-grid";
import type { ReadonlyTileGrid } from "../core/grid/types";
import { NeighborCounts } from "./neighbor-counts";

/** Largest id an `Int32Array`-backed grid can hold */
const MAX_TILE_ID = 0x7fffffff;
import {
  type CaRule,
  type CellTransform,
  createDefaultRules,
  type RuleSelector,
} from "./rules";

export class CaRuleEngine {
  private rules: CaRule[] = [];

  constructor() {
    this.resetRules();
  }

  /**
   * Append a rule; it shadows earlier rules with the same selector kind.
   */
  addRule(selector: RuleSelector, transform: CellTransform): void {
    this.rules.push({ selector, transform });
  }

  /**
   * Drop every rule and install the built-in transition for each base tile.
   */
  resetRules(): void {
    this.rules = createDefaultRules();
  }

  /**
   * Reset to the built-ins, then add `rules` in order.
   */
  installRules(rules: readonly CaRule[]): void {
    this.resetRules();
    for (const rule of rules) {
      this.addRule(rule.selector, rule.transform);
    }
  }

  getRules(): readonly CaRule[] {
    return this.rules;
  }

  ruleFor(tile: TileKind): CaRule | undefined {
    let wildcard: CaRule | undefined;
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i];
      if (!rule) continue;
      if (rule.selector.kind === "tile") {
        if (rule.selector.tile === tile) return rule;
      } else if (!wildcard) {
        wildcard = rule;
      }
    }
    return wildcard;
  }

  /**
   * Tally of the in-bounds 8-neighborhood of (x, y). No wraparound.
   */
  countNeighbors(grid: ReadonlyTileGrid, x: number, y: number): NeighborCounts {
    const counts = new NeighborCounts();
    grid.forEachNeighbor8(x, y, (_nx, _ny, tile) => counts.add(tile));
    return counts;
  }

  /**
   * Compute the next generation into a new grid. The input is only read.
   *
   * @throws {TerrainError} INVALID_ARGUMENT when a transform returns a
   *   non-integer or an id outside the int32 tile range
   */
  step(grid: ReadonlyTileGrid): TileGrid {
    const next = new TileGrid(grid.width, grid.height);
    const resolved = new Map<TileKind, CaRule | undefined>();

    grid.forEach((x, y, current) => {
      let rule = resolved.get(current);
      if (!resolved.has(current)) {
        rule = this.ruleFor(current);
        resolved.set(current, rule);
      }

      if (!rule) {
        next.setUnsafe(x, y, current);
        return;
      }

      const value = rule.transform(current, this.countNeighbors(grid, x, y), {
        x,
        y,
      });
      if (!Number.isInteger(value)) {
        throw TerrainError.invalidArgument(
          `Rule for tile ${current} returned non-integer ${String(value)} at (${x}, ${y})`,
          { x, y, tile: current, value },
        );
      }
      if (value < 1 || value > MAX_TILE_ID) {
        throw TerrainError.invalidArgument(
          `Rule for tile ${current} returned ${value} at (${x}, ${y}), outside tile ids 1..${MAX_TILE_ID}`,
          { x, y, tile: current, value },
        );
      }
      next.setUnsafe(x, y, value);
    });

    return next;
  }

  /**
   * Apply {@link step} `steps` times. Returns every generation after the
   * initial one.
   */
  evolve(
    initial: ReadonlyTileGrid,
    steps: number,
    onStep?: (generation: number, grid: TileGrid) => void,
  ): TileGrid[] {
    const generations: TileGrid[] = [];
    let current: ReadonlyTileGrid = initial;
    for (let i = 1; i <= steps; i++) {
      const next = this.step(current);
      generations.push(next);
      onStep?.(i, next);
      current = next;
    }
    return generations;
  }
}
