import { beliefStdDev, initBelief, precisionOf, updateBelief } from '../src/belief.js';
import { ConfigurationError } from '../src/errors.js';

describe('initBelief', () => {
  test('starts from prior mean, prior precision and zero observations', () => {
    expect(initBelief({ mean: 1, std: 0.5 })).toEqual({ mu: 1, beta: 4, n: 0 });
  });

  test.each([0, -0.1, Number.NaN, Number.POSITIVE_INFINITY, 1e200, 1e-170])('rejects prior std %p', std => {
    expect(() => initBelief({ mean: 0, std })).toThrow(ConfigurationError);
  });

  test('rejects a std whose precision underflows to zero', () => {
    expect(() => precisionOf(1e200, 'priors.A')).toThrow('priors.A: standard deviation 1e+200 gives an unusable precision 0');
  });

  test('rejects a std whose precision overflows', () => {
    expect(() => precisionOf(1e-170, 'sigmaW')).toThrow('sigmaW: standard deviation 1e-170 gives an unusable precision Infinity');
  });

  test('rejects a non-finite prior mean', () => {
    expect(() => initBelief({ mean: Number.NaN, std: 1 }, 'priors.A')).toThrow('priors.A: prior mean must be finite, got NaN');
  });
});

describe('updateBelief', () => {
  test('matches the closed-form posterior after one observation', () => {
    const prior = initBelief({ mean: 1, std: 0.5 });
    const betaW = precisionOf(0.25);
    const post = updateBelief(prior, 2, betaW);
    expect(betaW).toBe(16);
    expect(post.beta).toBe(20);
    expect(post.mu).toBe((prior.beta * prior.mu + betaW * 2) / (prior.beta + betaW));
    expect(post.mu).toBe(1.8);
    expect(post.n).toBe(1);
  });

  test('leaves the input belief untouched', () => {
    const prior = { mu: 0, beta: 1, n: 0 };
    updateBelief(prior, 5, 3);
    expect(prior).toEqual({ mu: 0, beta: 1, n: 0 });
  });

  test('precision adds up across repeated observations', () => {
    let b = initBelief({ mean: 0, std: 1 });
    for (let i = 0; i < 3; i++) b = updateBelief(b, 1, 4);
    expect(b.beta).toBe(13);
    expect(b.n).toBe(3);
    expect(beliefStdDev(b)).toBeCloseTo(1 / Math.sqrt(13), 12);
  });
});
