import { ConfigurationError } from './errors.js';
import type { BeliefState, PriorSpec } from './types.js';

/**
 * Precision (1 / std^2) of a strictly positive, finite standard deviation.
 * The precision itself must also be finite and > 0, which rules out stds so
 * small or so large that squaring them overflows or underflows.
 */
export function precisionOf(std: number, path: string | null = null): number {
  if (!Number.isFinite(std) || std <= 0) {
    throw new ConfigurationError(`standard deviation must be a positive finite number, got ${std}`, path);
  }
  const precision = 1 / (std * std);
  if (!Number.isFinite(precision) || precision <= 0) {
    throw new ConfigurationError(`standard deviation ${std} gives an unusable precision ${precision}`, path);
  }
  return precision;
}

export function initBelief(prior: PriorSpec, path: string | null = null): BeliefState {
  if (!Number.isFinite(prior.mean)) {
    throw new ConfigurationError(`prior mean must be finite, got ${prior.mean}`, path);
  }
  return { mu: prior.mean, beta: precisionOf(prior.std, path), n: 0 };
}

/**
 * Conjugate normal-normal update with a known observation precision.
 * Returns a new belief; the input is left as it was.
 */
export function updateBelief(belief: BeliefState, observation: number, betaW: number): BeliefState {
  const beta = belief.beta + betaW;
  const mu = (belief.beta * belief.mu + betaW * observation) / beta;
  return { mu, beta, n: belief.n + 1 };
}

export function beliefStdDev(belief: BeliefState): number {
  return 1 / Math.sqrt(belief.beta);
}
