import type { Alternative, BeliefState, PolicyKind } from './types.js';

/**
 * UCB score at 1-based trial t. Untried alternatives score +Infinity so every
 * alternative is tried once before ln(t)/n is ever evaluated.
 */
export function ucbScore(belief: BeliefState, t: number, theta: number): number {
  if (belief.n === 0) return Number.POSITIVE_INFINITY;
  return belief.mu + theta * Math.sqrt(Math.log(t) / belief.n);
}

/** Interval estimation: posterior mean plus theta posterior standard deviations. */
export function intervalEstimationScore(belief: BeliefState, theta: number): number {
  return belief.mu + theta / Math.sqrt(belief.beta);
}

export function scoreFor(kind: PolicyKind, belief: BeliefState, t: number, theta: number): number {
  switch (kind) {
    case 'ucb':
      return ucbScore(belief, t, theta);
    case 'interval-estimation':
      return intervalEstimationScore(belief, theta);
  }
}

/** Arg-max over `alternatives`; ties go to the one listed first. */
export function selectArgMax(alternatives: readonly Alternative[], score: (alt: Alternative) => number): Alternative {
  let bestId = alternatives[0] ?? '';
  let bestU = Number.NEGATIVE_INFINITY;
  for (const alt of alternatives) {
    const u = score(alt);
    if (u > bestU) { bestU = u; bestId = alt; }
  }
  return bestId;
}
