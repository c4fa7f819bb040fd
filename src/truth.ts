import { ConfigurationError, UsageError } from './errors.js';
import { sampleNormal, sampleUniform } from './random.js';
import type { Alternative, RandomSource, TruthDistributionSpec } from './types.js';

/**
 * Check a ground-truth distribution before any draw is made.
 * Width/std of 0 is allowed and gives a point mass.
 */
export function validateTruthSpec(spec: TruthDistributionSpec, path: string | null = null): TruthDistributionSpec {
  const finite = (x: number, what: string): void => {
    if (!Number.isFinite(x)) throw new ConfigurationError(`${what} must be finite, got ${x}`, path);
  };
  const nonNegative = (x: number, what: string): void => {
    finite(x, what);
    if (x < 0) throw new ConfigurationError(`${what} must be >= 0, got ${x}`, path);
  };
  const type: string = spec.type;
  switch (spec.type) {
    case 'constant':
      finite(spec.value, 'value');
      break;
    case 'uniform':
      finite(spec.mean, 'mean');
      nonNegative(spec.width, 'width');
      break;
    case 'normal':
      finite(spec.mean, 'mean');
      nonNegative(spec.std, 'std');
      break;
    default:
      throw new ConfigurationError(`unknown distribution type ${JSON.stringify(type)}`, path);
  }
  return spec;
}

/** Expected value of the distribution. */
export function truthMean(spec: TruthDistributionSpec): number {
  switch (spec.type) {
    case 'constant':
      return spec.value;
    case 'uniform':
    case 'normal':
      return spec.mean;
  }
}

export function drawFromSpec(spec: TruthDistributionSpec, rng: RandomSource): number {
  switch (spec.type) {
    case 'constant':
      return spec.value;
    case 'uniform':
      return sampleUniform(rng, spec.mean - spec.width / 2, spec.mean + spec.width / 2);
    case 'normal':
      return sampleNormal(rng, spec.mean, spec.std);
  }
}

/** Hands out one ground-truth value per alternative; the model calls it once per replication. */
export class TruthProvider {
  private readonly specs: Map<Alternative, TruthDistributionSpec>;

  constructor(specs: Record<Alternative, TruthDistributionSpec>) {
    this.specs = new Map();
    for (const [alt, spec] of Object.entries(specs)) {
      this.specs.set(alt, validateTruthSpec(spec, `truths.${alt}`));
    }
  }

  has(alternative: Alternative): boolean {
    return this.specs.has(alternative);
  }

  alternatives(): Alternative[] {
    return [...this.specs.keys()];
  }

  spec(alternative: Alternative): TruthDistributionSpec {
    const s = this.specs.get(alternative);
    if (!s) throw new UsageError(`No truth distribution for alternative "${alternative}"`);
    return s;
  }

  draw(alternative: Alternative, rng: RandomSource): number {
    return drawFromSpec(this.spec(alternative), rng);
  }
}
