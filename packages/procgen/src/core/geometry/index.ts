/**
 * Geometry module - shared 2D types and direction tables.
 */

export * from "./types";
