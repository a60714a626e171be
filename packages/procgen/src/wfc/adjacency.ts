/**
 * Directional adjacency rules for the wave solver.
 *
 * A rule lists, for a tile and a direction, which tiles may sit next to it
 * on that side. Tables may be asymmetric and are applied exactly as authored.
 */

import {
  type AdjacencyRuleSet,
  AdjacencyRulesSchema,
  DIRECTIONS,
  type Direction,
  DirectionSchema,
  NeighborListSchema,
  type TileKind,
} from "@terrain-sim/contracts";
import { BASE_TILE_UNIVERSE, BaseTile } from "../tiles/base-tiles";

const DEV_MODE = process.env.NODE_ENV !== "production";

const { WATER, SAND, GRASS, FOREST } = BaseTile;

/**
 * Coastline gradient: water below sand below grass below forest.
 */
export const DEFAULT_ADJACENCY_RULES: AdjacencyRuleSet = {
  [WATER]: {
    up: [WATER, SAND],
    down: [WATER],
    left: [WATER, SAND],
    right: [WATER, SAND],
  },
  [SAND]: {
    up: [SAND, GRASS],
    down: [WATER, SAND],
    left: [WATER, SAND, GRASS],
    right: [WATER, SAND, GRASS],
  },
  [GRASS]: {
    up: [GRASS, FOREST],
    down: [SAND, GRASS],
    left: [SAND, GRASS, FOREST],
    right: [SAND, GRASS, FOREST],
  },
  [FOREST]: {
    up: [FOREST],
    down: [GRASS, FOREST],
    left: [GRASS, FOREST],
    right: [GRASS, FOREST],
  },
};

type DirectionRules = Map<Direction, ReadonlySet<TileKind>>;

function warn(message: string): void {
  if (DEV_MODE) {
    console.warn(`AdjacencyRuleTable: ${message}`);
  }
}

/**
 * Copy authored rules into an internal map.
 *
 * Entries that do not parse (a non-numeric tile key, an unknown direction,
 * a list containing non-tiles) are skipped, leaving that pair unconstrained.
 */
function compileRules(rules: AdjacencyRuleSet): Map<TileKind, DirectionRules> {
  const compiled = new Map<TileKind, DirectionRules>();

  for (const [key, byDirection] of Object.entries(rules)) {
    const tile = Number(key);
    if (!Number.isInteger(tile) || tile <= 0) {
      warn(`ignoring rules for invalid tile key "${key}"`);
      continue;
    }
    if (typeof byDirection !== "object" || byDirection === null) {
      warn(`ignoring non-object rules for tile ${tile}`);
      continue;
    }

    const directions: DirectionRules = new Map();
    for (const [dirKey, neighbors] of Object.entries(byDirection)) {
      const direction = DirectionSchema.safeParse(dirKey);
      if (!direction.success) {
        warn(`ignoring unknown direction "${dirKey}" for tile ${tile}`);
        continue;
      }
      const list = NeighborListSchema.safeParse(neighbors);
      if (!list.success) {
        warn(`ignoring malformed ${dirKey} list for tile ${tile}`);
        continue;
      }
      directions.set(direction.data, new Set(list.data));
    }

    if (directions.size > 0) {
      compiled.set(tile, directions);
    }
  }

  return compiled;
}

/**
 * Issues found by a strict parse of `rules`, as "path: message" lines.
 * An empty list means every entry will be applied.
 */
export function validateAdjacencyRules(rules: unknown): string[] {
  const parsed = AdjacencyRulesSchema.safeParse(rules);
  if (parsed.success) return [];
  return parsed.error.issues.map(
    (issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`,
  );
}

export class AdjacencyRuleTable {
  private rules: Map<TileKind, DirectionRules>;
  private readonly universe: ReadonlySet<TileKind>;

  /**
   * @param universe - Tiles allowed wherever no rule is configured
   * @param rules - Initial rules; defaults to {@link DEFAULT_ADJACENCY_RULES}
   */
  constructor(
    universe: readonly TileKind[] = BASE_TILE_UNIVERSE,
    rules: AdjacencyRuleSet = DEFAULT_ADJACENCY_RULES,
  ) {
    this.universe = new Set(universe);
    this.rules = compileRules(rules);
  }

  /**
   * Replace the active rules with a copy of `rules`.
   */
  install(rules: AdjacencyRuleSet): void {
    this.rules = compileRules(rules);
  }

  /**
   * Restore {@link DEFAULT_ADJACENCY_RULES}.
   */
  reset(): void {
    this.rules = compileRules(DEFAULT_ADJACENCY_RULES);
  }

  /**
   * Whether an explicit (tile, direction) entry exists. Without one the
   * pair is unconstrained.
   */
  hasEntry(tile: TileKind, direction: Direction): boolean {
    return this.rules.get(tile)?.has(direction) ?? false;
  }

  /**
   * Tiles allowed as `tile`'s neighbor on its `direction` side, or the whole
   * universe when the pair has no entry.
   */
  allowedNeighbors(tile: TileKind, direction: Direction): ReadonlySet<TileKind> {
    return this.rules.get(tile)?.get(direction) ?? this.universe;
  }

  isValidNeighbor(
    tile: TileKind,
    neighbor: TileKind,
    direction: Direction,
  ): boolean {
    if (!this.hasEntry(tile, direction)) return true;
    return this.allowedNeighbors(tile, direction).has(neighbor);
  }

  /**
   * Snapshot of the configured rules in authoring form.
   */
  entries(): AdjacencyRuleSet {
    const out: Record<TileKind, Partial<Record<Direction, TileKind[]>>> = {};
    for (const [tile, byDirection] of this.rules) {
      const entry: Partial<Record<Direction, TileKind[]>> = {};
      for (const direction of DIRECTIONS) {
        const allowed = byDirection.get(direction);
        if (allowed) entry[direction] = Array.from(allowed);
      }
      out[tile] = entry;
    }
    return out;
  }
}
