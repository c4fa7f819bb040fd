#!/usr/bin/env node
import dotenv from 'dotenv';
import { applyOverrides, buildModel, loadScenario, parsePolicyKind, type ScenarioOverrides } from './config.js';
import { ConfigurationError } from './errors.js';
import { gridSearchTheta } from './grid.js';
import { createLogger, parseLogLevel } from './logger.js';
import { createPolicy } from './policy.js';
import { formatSummary, summarizeResults } from './results.js';
import { truthMean } from './truth.js';

const USAGE = [
  'Usage: bayes-trials --config scenario.json [options]',
  '  --policy ucb|ie        selection rule (default from scenario, else ucb)',
  '  --theta <x>            exploration weight',
  '  --replications <n>     number of replications',
  '  --seed <s>             master seed (env BAYES_TRIALS_SEED)',
  '  --grid 0,0.5,1         grid-search theta instead of a single run',
  '  --json                 print trial records as JSON lines',
  '  --log [--log-level l]  progress on stderr (env BAYES_TRIALS_LOG_LEVEL)'
].join('\n');

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const cur = argv[i];
    if (cur.startsWith('--')) {
      const key = cur.slice(2);
      const next = argv[i + 1];
      const val = next !== undefined && !next.startsWith('--') ? argv[++i] : 'true';
      out[key] = val;
    }
  }
  return out;
}

/** "0, 0.5,1" -> [0, 0.5, 1] */
function parseThetaList(raw: string): number[] {
  const parts = raw.split(',').map(s => s.trim()).filter(Boolean);
  if (parts.length === 0) throw new ConfigurationError('expected a comma-separated list of numbers', 'grid');
  return parts.map((p, i) => {
    const v = Number(p);
    if (!Number.isFinite(v)) throw new ConfigurationError(`not a number: "${p}"`, `grid[${i}]`);
    return v;
  });
}

function numberFlag(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === 'true') return undefined;
  const v = Number(raw);
  if (!Number.isFinite(v)) throw new ConfigurationError(`not a number: "${raw}"`, name);
  return v;
}

/** CLI flags first, then environment, then whatever the scenario file says. */
function resolveOverrides(args: Record<string, string>, env: NodeJS.ProcessEnv): ScenarioOverrides {
  const overrides: ScenarioOverrides = {};
  if (args.policy && args.policy !== 'true') overrides.kind = parsePolicyKind(args.policy, 'policy');
  const theta = numberFlag(args.theta, 'theta');
  if (theta !== undefined) overrides.theta = theta;
  const replications = numberFlag(args.replications, 'replications');
  if (replications !== undefined) overrides.replications = replications;
  const seed = numberFlag(args.seed ?? env.BAYES_TRIALS_SEED, 'seed');
  if (seed !== undefined) overrides.seed = seed;
  if (args.grid && args.grid !== 'true') overrides.grid = parseThetaList(args.grid);
  return overrides;
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  dotenv.config();
  const args = parseArgs(argv);
  if (!args.config || args.config === 'true') {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }
  const logEnabled = args.log !== undefined && args.log !== 'false';
  const logger = createLogger(logEnabled, parseLogLevel(args['log-level'] ?? process.env.BAYES_TRIALS_LOG_LEVEL));

  const loaded = applyOverrides(await loadScenario(args.config), resolveOverrides(args, process.env));
  // Pin the seed once so every grid point replays the same streams
  const scenario = loaded.seed !== undefined ? loaded : { ...loaded, seed: Math.floor(Math.random() * 2 ** 31) };
  logger.step('Scenario', `${args.config} alternatives=${scenario.alternatives.join(',')} seed=${scenario.seed}`);
  for (const alt of scenario.alternatives) {
    const spec = scenario.truths[alt];
    logger.debug(`${alt}: prior=${scenario.priors[alt].mean}±${scenario.priors[alt].std} truth ${spec.type} mean=${truthMean(spec)}`);
  }

  if (scenario.grid) {
    const { points, best } = gridSearchTheta({
      kind: scenario.policy.kind,
      thetas: scenario.grid,
      replications: scenario.replications,
      build: () => buildModel(scenario),
      logger
    });
    for (const p of points) console.log(`theta=${p.theta}\tscore=${p.score.toFixed(6)}`);
    console.log(`best theta=${best.theta} (score=${best.score.toFixed(6)})`);
    return;
  }

  const policy = createPolicy(buildModel(scenario), scenario.policy, logger);
  const records = policy.run(scenario.replications);
  if (args.json !== undefined && args.json !== 'false') {
    for (const rec of records) console.log(JSON.stringify(rec));
    return;
  }
  console.log(policy.name);
  console.log(formatSummary(summarizeResults(records, policy.model.alternatives)));
}

// Export for tests
export { parseArgs, parseThetaList, resolveOverrides, main, USAGE };

// Run when invoked directly (not when imported by tests)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exit(1);
  });
}
