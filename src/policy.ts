import { alternativeRecord } from './alternatives.js';
import { beliefStdDev } from './belief.js';
import { scoreFor, selectArgMax } from './bandit.js';
import { ConfigurationError } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import type { SimulationModel } from './model.js';
import type {
  Alternative, AlternativeRecord, BeliefState, PolicyKind, PolicyOptions, Snapshot, TrialRecord
} from './types.js';

export const POLICY_LABELS: Record<PolicyKind, string> = {
  ucb: 'UCB',
  'interval-estimation': 'Interval Estimation'
};

export function validateTheta(theta: number): number {
  if (!Number.isFinite(theta) || theta < 0) {
    throw new ConfigurationError(`must be a finite number >= 0, got ${theta}`, 'theta');
  }
  return theta;
}

/** Rejects kinds that slipped past the type checker (parsed JSON, plain JS callers). */
export function validatePolicyKind(kind: PolicyKind): PolicyKind {
  const known: readonly string[] = Object.keys(POLICY_LABELS);
  if (!known.includes(kind)) {
    throw new ConfigurationError(`unknown policy kind ${JSON.stringify(kind)}`, 'kind');
  }
  return kind;
}

/** Turn a model snapshot into a results row. */
export function toTrialRecord(snapshot: Snapshot): TrialRecord {
  const alternatives = alternativeRecord<AlternativeRecord>();
  for (const [alt, b] of Object.entries(snapshot.beliefs)) {
    alternatives[alt] = { mean: b.mu, stdDev: beliefStdDev(b), beta: b.beta, n: b.n, chosen: alt === snapshot.chosen };
  }
  return { replication: snapshot.replication, trial: snapshot.trial, chosen: snapshot.chosen, alternatives };
}

/**
 * Drives a model through replications and trials with one selection rule.
 * UCB and interval estimation share this loop and differ only in `kind`.
 */
export class Policy {
  readonly kind: PolicyKind;
  readonly theta: number;
  private readonly logger: Logger;

  constructor(readonly model: SimulationModel, opts: PolicyOptions, logger: Logger = silentLogger) {
    this.kind = validatePolicyKind(opts.kind);
    this.theta = validateTheta(opts.theta);
    this.logger = logger;
  }

  get name(): string {
    return `${POLICY_LABELS[this.kind]} (theta=${this.theta})`;
  }

  /** Pick the next alternative from the current beliefs; `t` is the 1-based trial within the replication. */
  select(beliefs: Readonly<Record<Alternative, Readonly<BeliefState>>>, t: number): Alternative {
    return selectArgMax(this.model.alternatives, alt => {
      const b = beliefs[alt];
      return b ? scoreFor(this.kind, b, t, this.theta) : Number.NEGATIVE_INFINITY;
    });
  }

  /** Play `nReplications` full replications; records come back in (replication, trial) order. */
  run(nReplications: number): TrialRecord[] {
    if (!Number.isInteger(nReplications) || nReplications <= 0) {
      throw new ConfigurationError(`must be a positive integer, got ${nReplications}`, 'replications');
    }
    const { horizon } = this.model;
    this.logger.step(`Run ${this.name}`, `replications=${nReplications}, horizon=${horizon}, seed=${this.model.seed}`);

    const records: TrialRecord[] = [];
    for (let r = 0; r < nReplications; r++) {
      const replication = this.model.reset(r);
      for (let t = 0; t < horizon; t++) {
        const chosen = this.select(this.model.beliefs(), t + 1);
        records.push(toTrialRecord(this.model.observe(chosen)));
      }
      this.logger.debug(`replication ${replication} done`);
    }
    this.logger.info(`Collected ${records.length} trial records`);
    return records;
  }
}

export function createPolicy(model: SimulationModel, opts: PolicyOptions, logger?: Logger): Policy {
  return new Policy(model, opts, logger);
}
