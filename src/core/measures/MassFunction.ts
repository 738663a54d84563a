/**
 * Discrete measures from a mass function over an explicit, finite support
 */

import { Measure } from '../Measure';

/**
 * Σ f(a)·p(a) over the support, summed in support order
 *
 * Nothing checks that the masses sum to 1 or that the support covers every
 * outcome with positive mass.
 */
export function fromMassFunction<A>(p: (outcome: A) => number, support: readonly A[]): Measure<A> {
  const outcomes: readonly A[] = [...support];

  return new Measure<A>((f) => {
    let total = 0;
    for (const a of outcomes) {
      total += f(a) * p(a);
    }
    return total;
  });
}
