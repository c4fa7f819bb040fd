import path from 'node:path';
import { applyOverrides, buildModel, loadScenario, parsePolicyKind, parseScenario } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { createPolicy } from '../src/policy.js';

const raw = {
  alternatives: {
    A: { prior: [0.3, 0.1], truth: { type: 'constant', value: 0.3 } },
    B: { prior: { mean: 0.2, std: 0.1 }, truth: 0.2 }
  },
  sigmaW: 0.05,
  horizon: 5,
  policy: { kind: 'ie', theta: 1.5 },
  seed: 42
};

describe('parseScenario', () => {
  test('accepts tuple and object priors and bare-number truths', () => {
    const s = parseScenario(raw);
    expect(s.priors).toEqual({ A: { mean: 0.3, std: 0.1 }, B: { mean: 0.2, std: 0.1 } });
    expect(s.truths).toEqual({ A: { type: 'constant', value: 0.3 }, B: { type: 'constant', value: 0.2 } });
    expect(s.policy).toEqual({ kind: 'interval-estimation', theta: 1.5 });
    expect(s.replications).toBe(1);
    expect(s.seed).toBe(42);
    expect(s.grid).toBeUndefined();
  });

  test('keeps "__proto__" as an ordinary alternative label', () => {
    const parsed = JSON.parse(
      '{ "alternatives": { "__proto__": { "prior": [0, 1], "truth": 0.1 }, "B": { "prior": [0, 1], "truth": 0.2 } },' +
      ' "sigmaW": 1, "horizon": 2, "seed": 3 }'
    );
    const s = parseScenario(parsed);
    expect(s.alternatives).toEqual(['__proto__', 'B']);
    expect(Object.keys(s.priors)).toEqual(['__proto__', 'B']);
    expect(Object.keys(s.truths)).toEqual(['__proto__', 'B']);

    const model = buildModel(s);
    expect(model.alternatives).toEqual(['__proto__', 'B']);
    const records = createPolicy(model, { kind: 'ucb', theta: 1 }).run(1);
    expect(records.map(r => r.chosen)).toEqual(['__proto__', 'B']);
    expect(records[1].alternatives['__proto__'].n).toBe(1);
  });

  test('the array form keeps integer-like labels in file order', () => {
    const s = parseScenario({
      ...raw,
      horizon: 3,
      alternatives: [
        { name: 'DrugB', prior: [0, 1], truth: 0 },
        { name: '10', prior: [0, 1], truth: 0 },
        { name: '2', prior: [0, 1], truth: 0 }
      ]
    });
    expect(s.alternatives).toEqual(['DrugB', '10', '2']);

    const model = buildModel(s);
    expect(model.alternatives).toEqual(['DrugB', '10', '2']);
    const records = createPolicy(model, { kind: 'ucb', theta: 1 }).run(1);
    expect(records.map(r => r.chosen)).toEqual(['DrugB', '10', '2']);
  });

  test('the array form rejects a repeated name', () => {
    const bad = { ...raw, alternatives: [{ name: 'A', prior: [0, 1], truth: 0 }, { name: 'A', prior: [0, 1], truth: 0 }] };
    expect(() => parseScenario(bad)).toThrow('alternatives[1]: duplicate alternative "A"');
  });

  test('defaults the policy to UCB with theta 1', () => {
    const { policy, ...rest } = raw;
    expect(parseScenario(rest).policy).toEqual({ kind: 'ucb', theta: 1 });
  });

  test('reports the path of a malformed value', () => {
    const bad = { ...raw, alternatives: { A: { prior: [0.3, 'x'], truth: 0.3 } } };
    expect(() => parseScenario(bad)).toThrow('alternatives.A.prior[1]: expected a finite number, got "x"');
  });

  test('rejects a negative truth width at parse time', () => {
    const bad = { ...raw, alternatives: { A: { prior: [0, 1], truth: { type: 'uniform', mean: 0, width: -0.1 } } } };
    expect(() => parseScenario(bad)).toThrow('alternatives.A.truth: width must be >= 0, got -0.1');
  });

  test.each([
    ['not an object', 5],
    ['no alternatives', { ...raw, alternatives: {} }],
    ['zero horizon', { ...raw, horizon: 0 }],
    ['unknown distribution', { ...raw, alternatives: { A: { prior: [0, 1], truth: { type: 'beta' } } } }],
    ['fractional seed', { ...raw, seed: 0.5 }],
    ['grid of strings', { ...raw, grid: ['a'] }],
    ['array entry without a name', { ...raw, alternatives: [{ prior: [0, 1], truth: 0 }] }]
  ])('rejects %s', (_label, input) => {
    expect(() => parseScenario(input)).toThrow(ConfigurationError);
  });
});

describe('parsePolicyKind', () => {
  test('maps the accepted spellings', () => {
    expect(parsePolicyKind('UCB')).toBe('ucb');
    expect(parsePolicyKind('ie')).toBe('interval-estimation');
    expect(parsePolicyKind('interval-estimation')).toBe('interval-estimation');
    expect(() => parsePolicyKind('thompson')).toThrow(ConfigurationError);
  });
});

describe('applyOverrides / buildModel', () => {
  test('overrides win over the file', () => {
    const s = applyOverrides(parseScenario(raw), { kind: 'ucb', theta: 0, replications: 3, seed: 7, grid: [0, 1] });
    expect(s.policy).toEqual({ kind: 'ucb', theta: 0 });
    expect(s.replications).toBe(3);
    expect(s.seed).toBe(7);
    expect(s.grid).toEqual([0, 1]);
  });

  test('builds a model with the scenario settings', () => {
    const model = buildModel(parseScenario(raw));
    expect(model.alternatives).toEqual(['A', 'B']);
    expect(model.horizon).toBe(5);
    expect(model.seed).toBe(42);
  });

  test('range errors surface from the model constructor', () => {
    expect(() => buildModel(parseScenario({ ...raw, sigmaW: 0 }))).toThrow('sigmaW: standard deviation must be a positive finite number, got 0');
  });
});

describe('loadScenario', () => {
  test('reads the bundled two-drug scenario', async () => {
    const s = await loadScenario(path.join(__dirname, '..', 'scenarios', 'two-drugs.json'));
    expect(s.alternatives).toEqual(['A', 'B']);
    expect(Object.keys(s.priors)).toEqual(['A', 'B']);
    expect(s.sigmaW).toBe(0.05);
    expect(s.horizon).toBe(5);
  });

  test('a missing file is a configuration error', async () => {
    await expect(loadScenario(path.join(__dirname, 'no-such-scenario.json'))).rejects.toThrow(ConfigurationError);
  });
});
