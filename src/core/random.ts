import { randomInt } from "node:crypto";

export interface RandomSource {
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

export const defaultRandom: RandomSource = {
  int: (maxExclusive) => randomInt(maxExclusive),
};

const UINT32_RANGE = 0x1_0000_0000;
export const MAX_SEED = UINT32_RANGE - 1;

/**
 * Deterministic generator (mulberry32) for reproducible output.
 * Not suitable where unpredictability matters. Seeds are 32-bit unsigned
 * integers; anything else is rejected rather than wrapped.
 */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new Error(`Random seed must be an integer between 0 and ${MAX_SEED}, got ${seed}.`);
  }
  let state = seed;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let mixed = state;
    mixed = Math.imul(mixed ^ (mixed >>> 15), mixed | 1);
    mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
    return ((mixed ^ (mixed >>> 14)) >>> 0) / UINT32_RANGE;
  };

  return {
    int: (maxExclusive) => Math.floor(next() * maxExclusive),
  };
}

/**
 * Uniformly choose one element of a non-empty array.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("pick: cannot choose from an empty list");
  }
  return items[random.int(items.length)];
}
