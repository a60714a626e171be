/**
 * Seed Utilities
 *
 * Turn user-facing seeds (numbers or strings) into the uint32 a
 * `SeededRandom` starts from.
 */

import {
  NumericSeedSchema,
  randomUint32,
  TerrainError,
} from "@terrain-sim/contracts";

/**
 * DJB2 hash of a string, as uint32.
 */
export function hashSeedString(input: string): number {
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Numeric seeds pass through; strings are hashed with {@link hashSeedString}.
 *
 * @throws {TerrainError} SEED_INVALID for negative, fractional or
 *   out-of-range numbers and empty strings
 */
export function normalizeSeed(seed: number | string): number {
  if (typeof seed === "string") {
    if (seed.length === 0) {
      throw TerrainError.seedInvalid("Seed string cannot be empty", { seed });
    }
    return hashSeedString(seed);
  }

  const parsed = NumericSeedSchema.safeParse(seed);
  if (!parsed.success) {
    throw TerrainError.seedInvalid(
      parsed.error.issues[0]?.message ?? "Invalid seed",
      { seed },
    );
  }
  return parsed.data;
}

/**
 * Fresh seed from the system random source
 */
export function randomSeed(): number {
  return randomUint32();
}
