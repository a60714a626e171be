import { DIRECTIONS, type Direction, type TileKind } from "@terrain-sim/contracts";
import { DIRECTION_OFFSETS, type Point } from "../core/geometry/types";
import type { ReadonlyTileGrid } from "../core/grid/types";
import type { AdjacencyRuleTable } from "./adjacency";

export interface AdjacencyViolation {
  readonly cell: Point;
  readonly tile: TileKind;
  readonly direction: Direction;
  readonly neighbor: TileKind;
}

/**
 * Every directed edge whose neighbor is not allowed by `rules`.
 * Cells are scanned row-major, directions in {@link DIRECTIONS} order.
 */
export function findAdjacencyViolations(
  grid: ReadonlyTileGrid,
  rules: AdjacencyRuleTable,
): AdjacencyViolation[] {
  const violations: AdjacencyViolation[] = [];

  grid.forEach((x, y, tile) => {
    for (const direction of DIRECTIONS) {
      const offset = DIRECTION_OFFSETS[direction];
      const neighbor = grid.getAt({ x: x + offset.x, y: y + offset.y });
      if (neighbor === undefined) continue;
      if (!rules.isValidNeighbor(tile, neighbor, direction)) {
        violations.push({ cell: { x, y }, tile, direction, neighbor });
      }
    }
  });

  return violations;
}
