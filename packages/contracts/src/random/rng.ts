/**
 * Helpers for drawing values from any number generator.
 */

/**
 * Minimal random source consumed by the solver and the simulation.
 * `SeededRandom` implements it; tests may pass a scripted stand-in.
 */
export interface RandomSource {
  /** Next float in [0, 1) */
  next(): number;
  /** Integer between min and max (inclusive) */
  range(min: number, max: number): number;
}

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random choice from an array, `undefined` when it is empty.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}
