/**
 * Core module - foundational primitives for terrain generation.
 */

export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
