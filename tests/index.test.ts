import {
  ConfigurationError, createPolicy, createSimulationModel, formatSummary, parseScenario, buildModel, summarizeResults
} from '../src/index.js';

describe('public API', () => {
  test('scenario -> model -> policy -> summary', () => {
    const scenario = parseScenario({
      alternatives: {
        Placebo: { prior: [0, 0.5], truth: 0 },
        DrugX: { prior: [0, 0.5], truth: { type: 'normal', mean: 0.5, std: 0.1 } }
      },
      sigmaW: 0.2,
      horizon: 8,
      policy: { kind: 'ie', theta: 1 },
      replications: 5,
      seed: 3
    });
    const records = createPolicy(buildModel(scenario), scenario.policy).run(scenario.replications);
    expect(records).toHaveLength(40);
    const summary = summarizeResults(records);
    expect(summary.alternatives.map(a => a.alternative)).toEqual(['Placebo', 'DrugX']);
    expect(summary.alternatives[0].choiceShare + summary.alternatives[1].choiceShare).toBeCloseTo(1, 12);
    expect(formatSummary(summary).split('\n')[0]).toBe('Replications: 5, trials recorded: 40');
  });

  test('an empty alternative set yields no model', () => {
    expect(() => createSimulationModel({ priors: {}, truths: {}, sigmaW: 1, horizon: 1 })).toThrow(ConfigurationError);
  });
});
