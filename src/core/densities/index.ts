/**
 * Named parametric densities and mass functions
 *
 * These produce inputs for `fromDensity` and `fromMassFunction`; the measure
 * core does not depend on them.
 */

import jStat from 'jstat';
import { ErrorCode, MeasureError } from '../errors';

export type Density = (x: number) => number;

function requirePositive(name: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, `${name} must be a positive finite number`, {
      [name]: value,
    });
  }
}

/**
 * Normal(mean, stdDev) density
 */
export function normalDensity(mean: number, stdDev: number): Density {
  requirePositive('stdDev', stdDev);
  return (x) => jStat.normal.pdf(x, mean, stdDev);
}

export const standardNormalDensity: Density = normalDensity(0, 1);

/**
 * Exponential(rate) density; zero below 0
 */
export function exponentialDensity(rate: number): Density {
  requirePositive('rate', rate);
  return (x) => jStat.exponential.pdf(x, rate);
}

/**
 * Chi-squared density; zero below 0 and unbounded at 0 when dof < 2
 */
export function chiSquaredDensity(dof: number): Density {
  requirePositive('dof', dof);
  return (x) => jStat.chisquare.pdf(x, dof);
}

/**
 * Uniform density on [a, b]
 */
export function uniformDensity(a: number, b: number): Density {
  if (!(a < b)) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, 'Uniform bounds must satisfy a < b', { a, b });
  }
  return (x) => jStat.uniform.pdf(x, a, b);
}

/**
 * Binomial(n, p) mass function; pair with `binomialSupport(n)`
 */
export function binomialMass(n: number, p: number): (k: number) => number {
  if (!Number.isInteger(n) || n < 0) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, 'n must be a non-negative integer', { n });
  }
  if (!(p >= 0 && p <= 1)) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, 'p must be between 0 and 1', { p });
  }
  return (k) => jStat.binomial.pdf(k, n, p);
}

/**
 * 0, 1, …, n
 */
export function binomialSupport(n: number): number[] {
  return Array.from({ length: n + 1 }, (_, k) => k);
}
