/**
 * Grid module - resolved terrain grids.
 */

export { TileGrid } from "./tile-grid";
export * from "./types";
