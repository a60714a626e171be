/**
 * Built-in terrain kinds.
 *
 * Ids match the order a fresh registry assigns them, so `BaseTile.WATER`
 * is the same value as `createDefaultRegistry().byName("water")`.
 */
export const BaseTile = {
  WATER: 1,
  SAND: 2,
  GRASS: 3,
  FOREST: 4,
} as const;

export type BaseTile = (typeof BaseTile)[keyof typeof BaseTile];

export const BASE_TILE_UNIVERSE: readonly BaseTile[] = [
  BaseTile.WATER,
  BaseTile.SAND,
  BaseTile.GRASS,
  BaseTile.FOREST,
];

/**
 * Name and display color of each base tile, in registration order.
 */
export const BASE_TILE_DEFINITIONS = [
  { name: "water", color: "#4169e1" }, // royalblue
  { name: "sand", color: "#ffc125" }, // goldenrod1
  { name: "grass", color: "#9acd32" }, // yellowgreen
  { name: "forest", color: "#228b22" }, // forestgreen
] as const;
