/* Strict domain types for the trial simulator */

/** Label of one alternative under evaluation (a drug). */
export type Alternative = string;

/** Uniform [0, 1) generator; every draw in the simulator goes through one of these. */
export type RandomSource = () => number;

/** Prior belief as configured: mean and standard deviation of the unknown effect. */
export interface PriorSpec {
  mean: number;
  std: number;
}

/** Posterior belief about one alternative's true mean. */
export interface BeliefState {
  /** Posterior mean */
  mu: number;
  /** Posterior precision (1 / variance), always > 0 */
  beta: number;
  /** Number of observations folded into the belief */
  n: number;
}

/** Distribution the ground truth of an alternative is drawn from, once per replication. */
export type TruthDistributionSpec =
  | { type: 'constant'; value: number }
  | { type: 'uniform'; mean: number; width: number }
  | { type: 'normal'; mean: number; std: number };

export type PolicyKind = 'ucb' | 'interval-estimation';

export interface PolicyOptions {
  kind: PolicyKind;
  /** Exploration weight, >= 0 */
  theta: number;
}

export type ModelPhase = 'idle' | 'in-replication';

/** What SimulationModel.observe hands back after one trial. */
export interface Snapshot {
  replication: number;
  trial: number;
  chosen: Alternative;
  beliefs: Readonly<Record<Alternative, Readonly<BeliefState>>>;
}

/** Per-alternative view inside a trial record. */
export interface AlternativeRecord {
  mean: number;
  stdDev: number;
  beta: number;
  n: number;
  /** Whether this alternative was the one observed on this trial */
  chosen: boolean;
}

/** One (replication, trial) row of the results sequence. */
export interface TrialRecord {
  replication: number;
  trial: number;
  chosen: Alternative;
  alternatives: Record<Alternative, AlternativeRecord>;
}

/** Scores a finished results sequence; higher is better. */
export type ResultsObjective = (records: TrialRecord[]) => number;
