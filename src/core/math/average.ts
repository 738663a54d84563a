/**
 * Streaming means
 *
 * Every empirical statistic funnels through `average`, so the update rule here
 * fixes the rounding behaviour of the whole library.
 */

/**
 * Running mean: m ← m + (x - m) / (n + 1)
 *
 * Accumulates without forming the full sum. The mean of an empty sequence is
 * the initial accumulator, 0.
 */
export function average(xs: Iterable<number>): number {
  let mean = 0;
  let n = 0;

  for (const x of xs) {
    mean += (x - mean) / (n + 1);
    n += 1;
  }

  return mean;
}

/**
 * Running mean of f applied to each element
 */
export function weightedAverage<A>(f: (a: A) => number, xs: Iterable<A>): number {
  return average(mapped(xs, f));
}

function* mapped<A>(xs: Iterable<A>, f: (a: A) => number): Generator<number> {
  for (const x of xs) {
    yield f(x);
  }
}
