import { choice, type RandomSource, range } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - 32-bit operations only
 * - Four 32-bit state words seeded through SplitMix32
 * - Returns a double in [0, 1)
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

function seedState(seed: number): RngState {
  const mix = splitmix32(seed >>> 0);
  const state: RngState = [mix(), mix(), mix(), mix()];

  // xoshiro needs at least one non-zero word
  if ((state[0] | state[1] | state[2] | state[3]) === 0) {
    state[0] = 1;
  }
  return state;
}

export class SeededRandom implements RandomSource {
  private s: RngState;
  private currentSeed: number;

  constructor(seed: number) {
    this.currentSeed = seed >>> 0;
    this.s = seedState(this.currentSeed);
    this.warmUp();
  }

  /**
   * The seed this generator was last (re)started from.
   */
  get seed(): number {
    return this.currentSeed;
  }

  /**
   * Restart the sequence from `seed`, as if freshly constructed.
   */
  reseed(seed: number): void {
    this.currentSeed = seed >>> 0;
    this.s = seedState(this.currentSeed);
    this.warmUp();
  }

  private warmUp(): void {
    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  next(): number {
    return this.next32() / 0x100000000;
  }

  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  /**
   * Save internal state for exact reproduction
   */
  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
