import * as fs from 'node:fs/promises';
import { alternativeRecord } from './alternatives.js';
import { ConfigurationError } from './errors.js';
import { createSimulationModel, type SimulationModel } from './model.js';
import { validateTruthSpec } from './truth.js';
import type { Alternative, PolicyKind, PolicyOptions, PriorSpec, TruthDistributionSpec } from './types.js';

/** A fully validated scenario file. */
export interface Scenario {
  /** Alternatives in the order the file lists them */
  alternatives: Alternative[];
  priors: Record<Alternative, PriorSpec>;
  truths: Record<Alternative, TruthDistributionSpec>;
  sigmaW: number;
  horizon: number;
  policy: PolicyOptions;
  replications: number;
  seed?: number;
  /** Theta values for a grid search, if the scenario asks for one */
  grid?: number[];
}

/** Values that take precedence over the scenario file (CLI flags, environment). */
export interface ScenarioOverrides {
  kind?: PolicyKind;
  theta?: number;
  replications?: number;
  seed?: number;
  grid?: number[];
}

const isRecord = (x: unknown): x is Record<string, unknown> => typeof x === 'object' && x !== null && !Array.isArray(x);

function num(x: unknown, path: string): number {
  if (typeof x !== 'number' || !Number.isFinite(x)) throw new ConfigurationError(`expected a finite number, got ${JSON.stringify(x)}`, path);
  return x;
}

/** Accepts "ucb", "ie" and "interval-estimation" (any case). */
export function parsePolicyKind(x: unknown, path = 'policy.kind'): PolicyKind {
  const v = typeof x === 'string' ? x.trim().toLowerCase() : '';
  if (v === 'ucb') return 'ucb';
  if (v === 'ie' || v === 'interval-estimation') return 'interval-estimation';
  throw new ConfigurationError(`expected "ucb" or "ie", got ${JSON.stringify(x)}`, path);
}

function parsePrior(x: unknown, path: string): PriorSpec {
  if (Array.isArray(x) && x.length === 2) return { mean: num(x[0], `${path}[0]`), std: num(x[1], `${path}[1]`) };
  if (isRecord(x)) return { mean: num(x.mean, `${path}.mean`), std: num(x.std, `${path}.std`) };
  throw new ConfigurationError('expected [mean, std] or { mean, std }', path);
}

function parseTruth(x: unknown, path: string): TruthDistributionSpec {
  if (typeof x === 'number') return validateTruthSpec({ type: 'constant', value: num(x, path) }, path);
  if (!isRecord(x)) throw new ConfigurationError('expected a number or a distribution object', path);
  switch (x.type) {
    case 'constant':
      return validateTruthSpec({ type: 'constant', value: num(x.value, `${path}.value`) }, path);
    case 'uniform':
      return validateTruthSpec({ type: 'uniform', mean: num(x.mean, `${path}.mean`), width: num(x.width ?? 0, `${path}.width`) }, path);
    case 'normal':
      return validateTruthSpec({ type: 'normal', mean: num(x.mean, `${path}.mean`), std: num(x.std ?? 0, `${path}.std`) }, path);
    default:
      throw new ConfigurationError(`unknown distribution type ${JSON.stringify(x.type)}`, `${path}.type`);
  }
}

/**
 * `alternatives` as (label, definition, path) in file order. The object form
 * follows JS key order, so integer-like labels move to the front; the array
 * form `[{ name, prior, truth }]` keeps every label where it was listed.
 */
function listAlternatives(x: unknown): Array<{ alt: Alternative; def: unknown; path: string }> {
  if (Array.isArray(x)) {
    return x.map((def: unknown, i) => {
      const path = `alternatives[${i}]`;
      const name = isRecord(def) ? def.name : undefined;
      if (typeof name !== 'string' || name === '') throw new ConfigurationError('expected { name, prior, truth } with a non-empty name', path);
      return { alt: name, def, path };
    });
  }
  if (isRecord(x)) return Object.entries(x).map(([alt, def]) => ({ alt, def, path: `alternatives.${alt}` }));
  throw new ConfigurationError('expected an object keyed by alternative or an array of { name, prior, truth }', 'alternatives');
}

function positiveInt(x: unknown, path: string): number {
  const n = num(x, path);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError(`expected a positive integer, got ${n}`, path);
  return n;
}

/**
 * Validate a parsed scenario JSON. Only structure and types are checked here;
 * numeric ranges are enforced again by the model and policy constructors.
 */
export function parseScenario(raw: unknown): Scenario {
  if (!isRecord(raw)) throw new ConfigurationError('scenario must be a JSON object');

  const alternatives: Alternative[] = [];
  const priors = alternativeRecord<PriorSpec>();
  const truths = alternativeRecord<TruthDistributionSpec>();
  for (const { alt, def, path } of listAlternatives(raw.alternatives)) {
    if (alternatives.includes(alt)) throw new ConfigurationError(`duplicate alternative "${alt}"`, path);
    if (!isRecord(def)) throw new ConfigurationError('expected { prior, truth }', path);
    priors[alt] = parsePrior(def.prior, `${path}.prior`);
    truths[alt] = parseTruth(def.truth, `${path}.truth`);
    alternatives.push(alt);
  }
  if (alternatives.length === 0) throw new ConfigurationError('at least one alternative is required', 'alternatives');

  const policyRaw: Record<string, unknown> = isRecord(raw.policy) ? raw.policy : {};
  const policy: PolicyOptions = {
    kind: policyRaw.kind === undefined ? 'ucb' : parsePolicyKind(policyRaw.kind),
    theta: policyRaw.theta === undefined ? 1 : num(policyRaw.theta, 'policy.theta')
  };

  const scenario: Scenario = {
    alternatives,
    priors,
    truths,
    sigmaW: num(raw.sigmaW, 'sigmaW'),
    horizon: positiveInt(raw.horizon, 'horizon'),
    policy,
    replications: raw.replications === undefined ? 1 : positiveInt(raw.replications, 'replications')
  };
  if (raw.seed !== undefined) {
    const seed = num(raw.seed, 'seed');
    if (!Number.isInteger(seed)) throw new ConfigurationError(`expected an integer, got ${seed}`, 'seed');
    scenario.seed = seed;
  }
  if (raw.grid !== undefined) {
    if (!Array.isArray(raw.grid)) throw new ConfigurationError('expected an array of theta values', 'grid');
    scenario.grid = raw.grid.map((t, i) => num(t, `grid[${i}]`));
  }
  return scenario;
}

export async function loadScenario(file: string): Promise<Scenario> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (e) {
    throw new ConfigurationError(`cannot read scenario ${file} (${e instanceof Error ? e.message : String(e)})`);
  }
  return parseScenario(raw);
}

export function applyOverrides(scenario: Scenario, overrides: ScenarioOverrides): Scenario {
  return {
    ...scenario,
    policy: {
      kind: overrides.kind ?? scenario.policy.kind,
      theta: overrides.theta ?? scenario.policy.theta
    },
    replications: overrides.replications ?? scenario.replications,
    ...(overrides.seed !== undefined ? { seed: overrides.seed } : {}),
    ...(overrides.grid !== undefined ? { grid: overrides.grid } : {})
  };
}

export function buildModel(scenario: Scenario): SimulationModel {
  return createSimulationModel({
    alternatives: scenario.alternatives,
    priors: scenario.priors,
    truths: scenario.truths,
    sigmaW: scenario.sigmaW,
    horizon: scenario.horizon,
    ...(scenario.seed !== undefined ? { seed: scenario.seed } : {})
  });
}
