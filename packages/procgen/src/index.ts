/**
 * Terrain generation: wave function collapse followed by a cellular
 * automaton.
 *
 * @example
 * ```typescript
 * import { runSimulation } from "@terrain-sim/procgen";
 *
 * const history = runSimulation(48, 32, 10, { seed: "archipelago" });
 * const last = history.frames[history.frames.length - 1];
 * console.log(history.checksum, last?.toRows());
 * ```
 */

// Core modules
export * from "./core";
// Tiles
export * from "./tiles";
// Wave function collapse
export * from "./wfc";
// Cellular automaton
export * from "./automata";
// Pipeline
export * from "./pipeline";
// Simulation
export * from "./simulation";
// Seeds
export { hashSeedString, normalizeSeed, randomSeed } from "./seed";
// Testing helpers
export {
  assertDeterministic,
  type DeterminismRun,
  DeterminismViolationError,
  testDeterminism,
} from "./testing";
