import { alternativeRecord } from './alternatives.js';
import { initBelief, precisionOf, updateBelief } from './belief.js';
import { ConfigurationError, UsageError } from './errors.js';
import { sampleObservation } from './observation.js';
import { createRandomSource, deriveSeed } from './random.js';
import { TruthProvider } from './truth.js';
import type {
  Alternative, BeliefState, ModelPhase, PriorSpec, RandomSource, Snapshot, TruthDistributionSpec
} from './types.js';

export interface SimulationModelOptions {
  /**
   * Configured alternative order, used for tie-breaks and truth draws.
   * Defaults to the key order of `priors`, which puts integer-like labels first.
   */
  alternatives?: readonly Alternative[];
  /** Prior per alternative */
  priors: Record<Alternative, PriorSpec>;
  /** Ground-truth distribution per alternative; must cover exactly the same keys */
  truths: Record<Alternative, TruthDistributionSpec>;
  /** Observation noise standard deviation, > 0 */
  sigmaW: number;
  /** Trials per replication (T), positive integer */
  horizon: number;
  /** Master seed; each replication gets its own stream derived from it */
  seed?: number;
}

/**
 * Owns every alternative's belief for the current replication.
 *
 * idle --reset()--> in-replication --reset()--> in-replication ...
 * observe() is only legal in-replication and at most `horizon` times per replication.
 */
export class SimulationModel {
  readonly alternatives: readonly Alternative[];
  readonly horizon: number;
  readonly sigmaW: number;
  /** beta_W = 1 / sigmaW^2 */
  readonly observationPrecision: number;
  readonly seed: number;

  private readonly priors: Map<Alternative, PriorSpec>;
  private readonly truthProvider: TruthProvider;
  private groundTruth = new Map<Alternative, number>();
  private state = new Map<Alternative, BeliefState>();
  private rng: RandomSource | null = null;
  private phaseInternal: ModelPhase = 'idle';
  private replicationInternal = -1;
  private trialInternal = 0;

  constructor(opts: SimulationModelOptions) {
    const alternatives = opts.alternatives ? [...opts.alternatives] : Object.keys(opts.priors);
    if (alternatives.length === 0) throw new ConfigurationError('at least one alternative is required', 'priors');

    const known = new Set<Alternative>();
    for (const alt of alternatives) {
      if (known.has(alt)) throw new ConfigurationError(`duplicate alternative "${alt}"`, 'alternatives');
      known.add(alt);
      if (!Object.hasOwn(opts.priors, alt)) throw new ConfigurationError(`missing prior for "${alt}"`, 'priors');
      if (!Object.hasOwn(opts.truths, alt)) throw new ConfigurationError(`missing truth distribution for "${alt}"`, 'truths');
    }
    for (const alt of Object.keys(opts.priors)) {
      if (!known.has(alt)) throw new ConfigurationError(`prior given for unknown alternative "${alt}"`, 'priors');
    }
    for (const alt of Object.keys(opts.truths)) {
      if (!known.has(alt)) throw new ConfigurationError(`truth given for unknown alternative "${alt}"`, 'truths');
    }

    if (!Number.isInteger(opts.horizon) || opts.horizon <= 0) {
      throw new ConfigurationError(`must be a positive integer, got ${opts.horizon}`, 'horizon');
    }
    const seed = opts.seed ?? Math.floor(Math.random() * 2 ** 32);
    if (!Number.isInteger(seed)) throw new ConfigurationError(`must be an integer, got ${seed}`, 'seed');

    this.priors = new Map();
    for (const alt of alternatives) {
      const prior = opts.priors[alt];
      initBelief(prior, `priors.${alt}`); // validates mean/std up front
      this.priors.set(alt, { ...prior });
    }
    this.observationPrecision = precisionOf(opts.sigmaW, 'sigmaW');
    this.truthProvider = new TruthProvider(opts.truths);

    this.alternatives = Object.freeze([...alternatives]);
    this.horizon = opts.horizon;
    this.sigmaW = opts.sigmaW;
    this.seed = seed;
  }

  get phase(): ModelPhase { return this.phaseInternal; }
  /** Index of the current replication, -1 before the first reset() */
  get replication(): number { return this.replicationInternal; }
  /** Trials already played in the current replication */
  get trial(): number { return this.trialInternal; }
  get exhausted(): boolean { return this.phaseInternal === 'in-replication' && this.trialInternal >= this.horizon; }

  /**
   * Start a replication: fresh random stream, fresh ground truth, beliefs back to the priors.
   * Defaults to the next index; passing an index replays that replication's stream.
   */
  reset(replication: number = this.replicationInternal + 1): number {
    if (!Number.isInteger(replication) || replication < 0) {
      throw new UsageError(`replication index must be a non-negative integer, got ${replication}`);
    }
    const rng = createRandomSource(deriveSeed(this.seed, replication));
    const truth = new Map<Alternative, number>();
    for (const alt of this.alternatives) truth.set(alt, this.truthProvider.draw(alt, rng));
    const beliefs = new Map<Alternative, BeliefState>();
    for (const [alt, prior] of this.priors) beliefs.set(alt, initBelief(prior));

    this.rng = rng;
    this.groundTruth = truth;
    this.state = beliefs;
    this.replicationInternal = replication;
    this.trialInternal = 0;
    this.phaseInternal = 'in-replication';
    return replication;
  }

  /** Play one trial on `chosen`: draw an observation and update that alternative's belief only. */
  observe(chosen: Alternative): Snapshot {
    if (this.phaseInternal !== 'in-replication' || !this.rng) {
      throw new UsageError('observe() called with no active replication; call reset() first');
    }
    if (this.trialInternal >= this.horizon) {
      throw new UsageError(`replication ${this.replicationInternal} already played its ${this.horizon} trials; call reset()`);
    }
    const current = this.state.get(chosen);
    const truth = this.groundTruth.get(chosen);
    if (!current || truth === undefined) {
      throw new UsageError(`unknown alternative "${chosen}"`);
    }

    const observation = sampleObservation(truth, this.sigmaW, this.rng);
    this.state.set(chosen, updateBelief(current, observation, this.observationPrecision));
    const trial = this.trialInternal;
    this.trialInternal += 1;
    return { replication: this.replicationInternal, trial, chosen, beliefs: this.beliefs() };
  }

  /** Frozen copy of the current beliefs, keyed by alternative. */
  beliefs(): Readonly<Record<Alternative, Readonly<BeliefState>>> {
    const out = alternativeRecord<Readonly<BeliefState>>();
    for (const alt of this.alternatives) {
      const b = this.state.get(alt);
      if (b) out[alt] = Object.freeze({ ...b });
    }
    return Object.freeze(out);
  }
}

/** Build a model, or throw ConfigurationError before anything is simulated. */
export function createSimulationModel(opts: SimulationModelOptions): SimulationModel {
  return new SimulationModel(opts);
}
