/**
 * Terrain value types shared by the solver, the automaton and configuration.
 */

/**
 * Opaque tile identifier. Equality is identity of the number; the registry
 * hands out positive integers starting at 1.
 */
export type TileKind = number;

export const DIRECTIONS = ["up", "down", "left", "right"] as const;

export type Direction = (typeof DIRECTIONS)[number];

/**
 * Adjacency rules as authored: for a tile, the tiles allowed as its neighbor
 * in each direction. A missing tile or direction means "anything goes".
 */
export type AdjacencyRuleSet = Readonly<
  Record<TileKind, Readonly<Partial<Record<Direction, readonly TileKind[]>>>>
>;

/**
 * One clause of a threshold transition: when at least `atLeast` of the eight
 * neighbors are `neighbor`, the cell becomes `becomes`.
 */
export interface ThresholdClause {
  readonly neighbor: TileKind;
  readonly atLeast: number;
  readonly becomes: TileKind;
}

/**
 * Declarative evolution rule, as read from configuration.
 * `tile: "*"` applies to any tile without a more specific rule.
 */
export interface EvolutionRuleSpec {
  readonly tile: TileKind | "*";
  readonly clauses: readonly ThresholdClause[];
}

export interface SimulationConfigInput {
  width: number;
  height: number;
  steps: number;
  seed?: number | string;
  trace?: boolean;
}
