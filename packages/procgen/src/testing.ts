/**
 * Testing utilities for terrain simulation.
 * Kept apart from the simulation module so tests can import them without
 * pulling them into the public runtime surface by accident.
 */

import {
  runSimulation,
  type SimulationRunOptions,
} from "./simulation/simulation";

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

export interface DeterminismRun {
  readonly width: number;
  readonly height: number;
  readonly steps: number;
  /** Required: unseeded runs are expected to differ */
  readonly options: SimulationRunOptions & { readonly seed: number | string };
}

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly run: DeterminismRun,
  ) {
    super(
      `Non-deterministic simulation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Assert that a seeded simulation produces identical histories.
 *
 * Each run uses a fresh simulation instance, so shared state between
 * instances would show up as differing checksums.
 *
 * @throws {DeterminismViolationError} If different runs produce different checksums
 *
 * @example
 * ```typescript
 * it("coastline terrain is deterministic", () => {
 *   assertDeterministic({ width: 32, height: 32, steps: 5, options: { seed: 42 } });
 * });
 * ```
 */
export function assertDeterministic(run: DeterminismRun, runs: number = 3): void {
  const { uniqueChecksums } = testDeterminism(run, runs);
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, run);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 *
 * Useful for debugging determinism issues.
 */
export function testDeterminism(
  run: DeterminismRun,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  durations: number[];
  avgDuration: number;
} {
  const checksums: string[] = [];
  const durations: number[] = [];

  for (let i = 0; i < runs; i++) {
    const history = runSimulation(run.width, run.height, run.steps, run.options);
    checksums.push(history.checksum);
    durations.push(history.durationMs);
  }

  const uniqueChecksums = [...new Set(checksums)];
  const avgDuration =
    durations.length > 0
      ? durations.reduce((a, b) => a + b, 0) / durations.length
      : 0;

  return {
    deterministic: uniqueChecksums.length <= 1,
    checksums,
    uniqueChecksums,
    durations,
    avgDuration,
  };
}
