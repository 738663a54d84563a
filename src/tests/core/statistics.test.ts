import { describe, it, expect } from 'vitest';
import {
  volume,
  expectation,
  variance,
  standardDeviation,
  between,
  probability,
  cdf,
} from '../../core/statistics';
import { fromObservations, fromDensity, fromMassFunction } from '../../core/measures';
import { standardNormalDensity, normalDensity } from '../../core/densities';

const oneToTen = fromObservations([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

describe('empirical statistics', () => {
  it('should compute volume, expectation and variance', () => {
    const mu = fromObservations([1, 2, 3, 4]);

    expect(volume(mu)).toBe(1);
    expect(expectation(mu)).toBe(2.5);
    expect(variance(mu)).toBeCloseTo(1.25, 12);
    expect(standardDeviation(mu)).toBeCloseTo(Math.sqrt(1.25), 12);
  });

  it('should use the raw second moment for variance', () => {
    const mu = fromObservations([2, 4]);
    // E[X²] = 10, E[X]² = 9
    expect(variance(mu)).toBe(1);
  });
});

describe('between', () => {
  it('should be the indicator of the closed interval', () => {
    const inside = between(1, 2);

    expect(inside(0.999)).toBe(0);
    expect(inside(1)).toBe(1);
    expect(inside(1.5)).toBe(1);
    expect(inside(2)).toBe(1);
    expect(inside(2.001)).toBe(0);
  });

  it('should accept infinite bounds', () => {
    expect(between(-Infinity, 0)(-1e300)).toBe(1);
    expect(between(-Infinity, 0)(-Infinity)).toBe(1);
  });
});

describe('cdf', () => {
  it('should step through an empirical measure', () => {
    expect(cdf(oneToTen, 0)).toBe(0);
    expect(cdf(oneToTen, 1)).toBeCloseTo(0.1, 12);
    expect(cdf(oneToTen, 5)).toBeCloseTo(0.5, 12);
    expect(cdf(oneToTen, 10)).toBe(1);
    expect(cdf(oneToTen, 11)).toBe(1);
  });

  it('should work for a mass function', () => {
    const die = fromMassFunction(() => 1 / 6, [1, 2, 3, 4, 5, 6]);
    expect(cdf(die, 3)).toBeCloseTo(0.5, 12);
    expect(cdf(die, 0.5)).toBe(0);
  });

  it('should work for a density', () => {
    const mu = fromDensity(standardNormalDensity);

    expect(cdf(mu, 0)).toBeCloseTo(0.5, 2);
    expect(cdf(mu, 1)).toBeCloseTo(0.8413, 2);
    expect(cdf(mu, Infinity)).toBeCloseTo(1, 7);
  });
});

describe('probability', () => {
  it('should measure a closed interval', () => {
    expect(probability(oneToTen, 3, 5)).toBeCloseTo(0.3, 12);
    expect(probability(oneToTen, 20, 30)).toBe(0);
  });

  it('should measure an interval under a density', () => {
    expect(probability(fromDensity(standardNormalDensity), -1, 1)).toBeCloseTo(0.6827, 2);
  });
});

describe('independent combination of densities', () => {
  const mu = fromDensity(standardNormalDensity);
  const nu = fromDensity(standardNormalDensity);

  it('should add two standard normals', () => {
    const sum = mu.add(nu);
    expect(expectation(sum)).toBeCloseTo(0, 6);
    expect(variance(sum)).toBeCloseTo(2, 5);
  });

  it('should subtract two standard normals', () => {
    const difference = mu.subtract(nu);
    expect(expectation(difference)).toBeCloseTo(0, 6);
    expect(variance(difference)).toBeCloseTo(2, 5);
  });

  it('should multiply N(2, 1) and N(3, 1)', () => {
    const product = fromDensity(normalDensity(2, 1)).multiply(fromDensity(normalDensity(3, 1)));

    // E[X²]E[Y²] - E[X]²E[Y]² = 5 · 10 - 36
    expect(expectation(product)).toBeCloseTo(6, 5);
    expect(variance(product)).toBeCloseTo(14, 4);
  });
});

describe('Bayesian composition of densities', () => {
  it('should marginalise a normal location over a normal prior', () => {
    const prior = fromDensity(standardNormalDensity);
    const marginal = prior.bind((theta) => fromDensity(normalDensity(theta, 1)));

    // N(0, 1) prior, N(θ, 1) likelihood → N(0, 2) marginal
    expect(volume(marginal)).toBeCloseTo(1, 4);
    expect(expectation(marginal)).toBeCloseTo(0, 4);
    expect(variance(marginal)).toBeCloseTo(2, 3);
  });
});
