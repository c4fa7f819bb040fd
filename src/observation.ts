import { sampleNormal } from './random.js';
import type { RandomSource } from './types.js';

/** One noisy reading of an alternative: Normal(groundTruth, sigmaW). */
export function sampleObservation(groundTruth: number, sigmaW: number, rng: RandomSource): number {
  return sampleNormal(rng, groundTruth, sigmaW);
}
