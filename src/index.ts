export * from './types.js';
export { ConfigurationError, UsageError } from './errors.js';
export { alternativeRecord } from './alternatives.js';
export { createRandomSource, deriveSeed, sampleNormal, sampleUniform } from './random.js';
export { initBelief, updateBelief, beliefStdDev, precisionOf } from './belief.js';
export { sampleObservation } from './observation.js';
export { TruthProvider, validateTruthSpec, truthMean, drawFromSpec } from './truth.js';
export { SimulationModel, createSimulationModel, type SimulationModelOptions } from './model.js';
export { ucbScore, intervalEstimationScore, scoreFor, selectArgMax } from './bandit.js';
export { Policy, createPolicy, toTrialRecord, validatePolicyKind, POLICY_LABELS } from './policy.js';
export {
  deriveChosenFlags, finalRecords, summarizeResults, formatSummary, finalBestMean,
  type AlternativeSummary, type ResultsSummary
} from './results.js';
export { gridSearchTheta, type GridSearchOptions, type GridPoint, type GridSearchResult } from './grid.js';
export {
  parseScenario, loadScenario, applyOverrides, buildModel, parsePolicyKind,
  type Scenario, type ScenarioOverrides
} from './config.js';
export { createLogger, silentLogger, parseLogLevel, type Logger, type LogLevel } from './logger.js';
