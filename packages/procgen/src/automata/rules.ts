/**
 * Cellular automaton rule types and the built-in terrain transitions.
 */

import {
  type EvolutionRuleSpec,
  EvolutionRuleSpecSchema,
  TerrainError,
  type ThresholdClause,
  type TileKind,
} from "@terrain-sim/contracts";
import { BaseTile } from "../tiles/base-tiles";
import type { NeighborCounts } from "./neighbor-counts";

export type RuleSelector =
  | { readonly kind: "tile"; readonly tile: TileKind }
  | { readonly kind: "any" };

export interface CellPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * Next value of a cell given its current value and 8-neighborhood tally.
 */
export type CellTransform = (
  current: TileKind,
  counts: NeighborCounts,
  cell: CellPosition,
) => TileKind;

export interface CaRule {
  readonly selector: RuleSelector;
  readonly transform: CellTransform;
}

export function exactTile(tile: TileKind): RuleSelector {
  return { kind: "tile", tile };
}

export const ANY_TILE: RuleSelector = { kind: "any" };

/**
 * Transform that applies the first clause whose threshold is met, or keeps
 * the current value when none is.
 *
 * @example
 * ```typescript
 * // sand turns to water next to lots of water, else to grass
 * thresholdTransition([
 *   { neighbor: BaseTile.WATER, atLeast: 5, becomes: BaseTile.WATER },
 *   { neighbor: BaseTile.GRASS, atLeast: 3, becomes: BaseTile.GRASS },
 * ]);
 * ```
 */
export function thresholdTransition(
  clauses: readonly ThresholdClause[],
): CellTransform {
  const ordered = clauses.map((clause) => ({ ...clause }));
  return (current, counts) => {
    for (const clause of ordered) {
      if (counts.get(clause.neighbor) >= clause.atLeast) {
        return clause.becomes;
      }
    }
    return current;
  };
}

const { WATER, SAND, GRASS, FOREST } = BaseTile;

export const DEFAULT_TRANSITIONS: Readonly<Record<TileKind, readonly ThresholdClause[]>> = {
  [WATER]: [],
  [SAND]: [
    { neighbor: WATER, atLeast: 5, becomes: WATER },
    { neighbor: GRASS, atLeast: 3, becomes: GRASS },
  ],
  [GRASS]: [
    { neighbor: FOREST, atLeast: 3, becomes: FOREST },
    { neighbor: SAND, atLeast: 5, becomes: SAND },
  ],
  [FOREST]: [
    { neighbor: WATER, atLeast: 4, becomes: GRASS },
    { neighbor: SAND, atLeast: 5, becomes: GRASS },
  ],
};

/**
 * One exact-tile rule per base kind.
 */
export function createDefaultRules(): CaRule[] {
  return Object.entries(DEFAULT_TRANSITIONS).map(([tile, clauses]) => ({
    selector: exactTile(Number(tile)),
    transform: thresholdTransition(clauses),
  }));
}

export function isCaRule(rule: CaRule | EvolutionRuleSpec): rule is CaRule {
  return "selector" in rule;
}

/**
 * Compile a declarative rule from configuration.
 *
 * @throws {TerrainError} INVALID_ARGUMENT when the spec does not validate
 */
export function compileEvolutionRuleSpec(spec: unknown): CaRule {
  const parsed = EvolutionRuleSpecSchema.safeParse(spec);
  if (!parsed.success) {
    throw TerrainError.invalidArgument(
      `Invalid evolution rule: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      { spec },
    );
  }

  const { tile, clauses } = parsed.data;
  return {
    selector: tile === "*" ? ANY_TILE : exactTile(tile),
    transform: thresholdTransition(clauses),
  };
}

/**
 * Normalize a mixed list of rules and specs into rules.
 */
export function toCaRules(
  rules: readonly (CaRule | EvolutionRuleSpec)[],
): CaRule[] {
  return rules.map((rule) =>
    isCaRule(rule) ? rule : compileEvolutionRuleSpec(rule),
  );
}
