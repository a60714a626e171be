import { getRandomValues } from "node:crypto";

/**
 * Unsigned 32-bit value from the system CSPRNG. Used to pick a seed when
 * the caller does not supply one; never used inside a seeded run.
 */
export function randomUint32(): number {
  const buffer = getRandomValues(new Uint32Array(1));
  return (buffer[0] ?? 0) >>> 0;
}

/**
 * Several system-random uint32 values, e.g. for seeding independent runs.
 */
export function randomUint32s(count: number): number[] {
  if (!Number.isInteger(count) || count < 0) {
    return [];
  }
  return Array.from(getRandomValues(new Uint32Array(count)), (v) => v >>> 0);
}
