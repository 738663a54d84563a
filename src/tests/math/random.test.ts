import { describe, it, expect } from 'vitest';
import { RNG } from '../../core/math/random';
import { fromObservations } from '../../core/measures';
import { expectation, variance } from '../../core/statistics';
import { MeasureError } from '../../core/errors';

function mean(xs: number[]): number {
  return xs.reduce((sum, x) => sum + x, 0) / xs.length;
}

describe('RNG', () => {
  it('should reproduce a sequence from the same seed', () => {
    const a = new RNG(12345);
    const b = new RNG(12345);

    const first = [a.uniform(), a.normal(), a.exponential(2)];
    const second = [b.uniform(), b.normal(), b.exponential(2)];
    expect(first).toEqual(second);
  });

  it('should draw uniforms in [0, 1)', () => {
    const rng = new RNG(42);
    const draws = rng.samples(1000, (r) => r.uniform());

    expect(draws.every((u) => u >= 0 && u < 1)).toBe(true);
  });

  it('should draw normals with the right moments', () => {
    const rng = new RNG(42);
    const draws = rng.samples(10000, (r) => r.normalDistribution(5, 2));

    expect(mean(draws)).toBeCloseTo(5, 0);
  });

  it('should draw exponentials with the right mean', () => {
    const rng = new RNG(42);
    const draws = rng.samples(10000, (r) => r.exponential(1));

    expect(draws.every((x) => x >= 0)).toBe(true);
    expect(mean(draws)).toBeCloseTo(1, 1);
  });

  it('should draw chi-squared values with the right mean', () => {
    const rng = new RNG(42);
    const draws = rng.samples(10000, (r) => r.chiSquared(5));

    expect(draws.every((x) => x > 0)).toBe(true);
    expect(mean(draws)).toBeCloseTo(5, 0);
  });

  it('should draw gammas with shape below 1', () => {
    const rng = new RNG(42);
    const draws = rng.samples(10000, (r) => r.gamma(0.5, 2));

    // mean = shape · scale
    expect(mean(draws)).toBeCloseTo(1, 0);
  });

  it('should feed an empirical measure', () => {
    const rng = new RNG(2024);
    const mu = fromObservations(rng.samples(10000, (r) => r.normal()));

    expect(expectation(mu)).toBeCloseTo(0, 1);
    expect(variance(mu)).toBeCloseTo(1, 1);
  });

  it('should reject invalid parameters', () => {
    const rng = new RNG(1);

    expect(() => rng.normalDistribution(0, 0)).toThrow(MeasureError);
    expect(() => rng.exponential(-1)).toThrow('Exponential rate must be positive');
    expect(() => rng.gamma(0, 1)).toThrow('Gamma parameters must be positive');
    expect(() => rng.samples(-1, (r) => r.uniform())).toThrow(MeasureError);
    expect(rng.samples(0, (r) => r.uniform())).toEqual([]);
  });
});
