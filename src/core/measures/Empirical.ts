/**
 * Empirical measures
 */

import { Measure } from '../Measure';
import { weightedAverage } from '../math/average';

/**
 * Measure whose integral is the running mean of f over the observations
 *
 * The samples are copied, so later changes to the caller's array do not
 * reach the measure. An empty sample integrates every function to 0.
 */
export function fromObservations<A>(observations: readonly A[]): Measure<A> {
  const samples: readonly A[] = [...observations];
  return new Measure<A>((f) => weightedAverage(f, samples));
}

/**
 * The empirical measure over an empty sample
 *
 * Applied directly it gives 0 for every test function, including the
 * constant 1, so it is the zero measure rather than a probability measure.
 */
export function identityMeasure<A>(): Measure<A> {
  return fromObservations<A>([]);
}
