import { ConfigurationError } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import type { SimulationModel } from './model.js';
import { Policy, validateTheta } from './policy.js';
import { finalBestMean } from './results.js';
import type { PolicyKind, ResultsObjective } from './types.js';

export interface GridSearchOptions {
  kind: PolicyKind;
  thetas: number[];
  replications: number;
  /** Fresh model per grid point, so every theta sees the same random streams */
  build: () => SimulationModel;
  objective?: ResultsObjective;
  logger?: Logger;
}

export interface GridPoint {
  theta: number;
  score: number;
}

export interface GridSearchResult {
  points: GridPoint[];
  best: GridPoint;
}

/** Run the policy once per theta and score each results sequence. Best: highest score, ties to the earlier theta. */
export function gridSearchTheta(opts: GridSearchOptions): GridSearchResult {
  const { kind, thetas, replications, build, objective = finalBestMean } = opts;
  const logger = (opts.logger ?? silentLogger).child('grid');
  if (thetas.length === 0) throw new ConfigurationError('at least one theta is required', 'grid');
  thetas.forEach(validateTheta);

  const points: GridPoint[] = [];
  for (const theta of thetas) {
    const policy = new Policy(build(), { kind, theta }, logger);
    const score = objective(policy.run(replications));
    points.push({ theta, score });
    logger.step(`theta=${theta}`, `score=${score.toFixed(4)}`);
  }

  let best = points[0];
  for (const p of points) if (p.score > best.score) best = p;
  return { points, best };
}
