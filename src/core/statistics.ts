/**
 * Statistics read off a measure by integrating a specific test function
 */

import type { Measure, TestFunction } from './Measure';

/**
 * Total mass; 1 for a probability measure
 */
export function volume<A>(mu: Measure<A>): number {
  return mu.apply(() => 1);
}

export function expectation(mu: Measure<number>): number {
  return mu.apply((x) => x);
}

/**
 * E[X²] - E[X]²
 *
 * Raw-moment form: loses precision when the mean is large next to the spread.
 */
export function variance(mu: Measure<number>): number {
  const mean = expectation(mu);
  return mu.apply((x) => x * x) - mean * mean;
}

export function standardDeviation(mu: Measure<number>): number {
  return Math.sqrt(variance(mu));
}

/**
 * Indicator of the closed interval [a, b]
 */
export function between(a: number, b: number): TestFunction<number> {
  return (x) => (x >= a && x <= b ? 1 : 0);
}

/**
 * P(a ≤ X ≤ b)
 */
export function probability(mu: Measure<number>, a: number, b: number): number {
  return expectation(mu.map(between(a, b)));
}

/**
 * P(X ≤ b); the same code serves empirical, discrete and continuous measures
 *
 * @example
 * ```typescript
 * const mu = fromObservations([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
 * cdf(mu, 0);  // 0
 * cdf(mu, 10); // 1
 * ```
 */
export function cdf(mu: Measure<number>, b: number): number {
  return probability(mu, -Infinity, b);
}
