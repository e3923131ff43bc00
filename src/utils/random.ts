import { randomInt } from 'node:crypto';

const SEED_RANGE = 2 ** 32;

/** Nový seed z kryptografického zdroje, v rozsahu 0 .. 2^32-1 */
export function generateSeed(): number {
  return randomInt(0, SEED_RANGE);
}

/**
 * Mulberry32 PRNG. Same seed, same sequence of floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher–Yates nad kopií vstupu, řízený seedem.
 */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  const next = mulberry32(seed);

  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(next() * (i + 1));
    const current = result[i];
    const swap = result[j];
    if (current === undefined || swap === undefined) continue;
    result[i] = swap;
    result[j] = current;
  }

  return result;
}
