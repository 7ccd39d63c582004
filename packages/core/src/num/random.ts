/**
 * Random sources for sampling-based fitting
 *
 * Callers inject the generator so that tests (and reproducible host runs)
 * can pin the sequence with a seed.
 */

/** Uniform generator on [0, 1) */
export type PRNG = () => number;

/** Create a seedable PRNG using the mulberry32 algorithm. */
export function createPRNG(seed: number): PRNG {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Non-reproducible source backed by Math.random */
export const systemRandom: PRNG = () => Math.random();

/**
 * Draw `k` distinct indices from [0, n) with a partial Fisher-Yates shuffle.
 * Returns fewer than `k` indices only when n < k.
 */
export function sampleDistinctIndices(n: number, k: number, rng: PRNG): number[] {
  const pool = Array.from({ length: n }, (_, i) => i);
  const count = Math.min(k, n);
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (n - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count);
}
