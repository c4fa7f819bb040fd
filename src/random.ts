import type { RandomSource } from './types.js';

/**
 * Mulberry32 seeded PRNG. Same seed, same stream.
 *
 * @param seed - Any integer; only the low 32 bits are used
 * @returns Generator of numbers in [0, 1)
 */
export function createRandomSource(seed: number): RandomSource {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Split a master seed into independent per-stream seeds (one stream per replication),
 * so replication r sees the same numbers no matter what ran before it.
 */
export function deriveSeed(masterSeed: number, stream: number): number {
  let h = (masterSeed ^ 0x9e3779b9) | 0;
  h = Math.imul(h ^ (stream + 1), 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/** Box-Muller normal draw. */
export function sampleNormal(rng: RandomSource, mean: number, std: number): number {
  if (std === 0) return mean;
  const u1 = 1 - rng(); // (0, 1], keeps log finite
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + std * z;
}

export function sampleUniform(rng: RandomSource, low: number, high: number): number {
  if (low === high) return low;
  return low + (high - low) * rng();
}
