/**
 * Measure algebra tour
 *
 * Builds measures from simulated observations and from densities, combines
 * them, and prints the statistics next to the values they should approach.
 *
 * Run with: npm run demo
 */

import {
  RNG,
  fromObservations,
  fromDensity,
  standardNormalDensity,
  normalDensity,
  chiSquaredDensity,
  expectation,
  variance,
  cdf,
  isMeasureError,
} from '../src';

const LABEL_WIDTH = 62;

function report(label: string, value: number): void {
  console.log(`${label.padEnd(LABEL_WIDTH)}${value.toFixed(6)}`);
}

export function measureDemo(seed: number = 2024): void {
  const rng = new RNG(seed);

  const expSamples = rng.samples(100, (r) => r.exponential(1));
  const normSamples = rng.samples(100, (r) => r.normal());
  const shiftedSamples = rng.samples(1000, (r) => r.normalDistribution(2, 1));
  const chiSamples = rng.samples(1000, (r) => r.chiSquared(5));

  const mu = fromDensity(standardNormalDensity);
  const nu = fromObservations(expSamples);
  const rho = mu.map(Math.cos).add(nu.map(Math.sin));
  const eta = rho.map(Math.exp);

  console.log('=== Empirical and mixed measures ===\n');
  report('mean of normal samples (should be around 0):', expectation(fromObservations(normSamples)));
  report('variance of normal samples (should be around 1):', variance(fromObservations(normSamples)));
  report('X ~ N(0, 1), Y ~ observed. mean of exp(cos X + sin Y):', expectation(eta));
  report('P(X <= 1) for X ~ N(0, 1) (should be around 0.841):', cdf(mu, 1));

  console.log('\n=== Arithmetic on independent variables ===\n');

  const iota = mu.subtract(mu);
  report('X, Y ~ N(0, 1). mean of X - Y (should be 0):', expectation(iota));
  report('X, Y ~ N(0, 1). variance of X - Y (should be 2):', variance(iota));

  const phi = fromDensity(normalDensity(2, 1));
  const xi = fromDensity(normalDensity(3, 1));
  const zeta = phi.multiply(xi);
  report('X ~ N(2, 1), Y ~ N(3, 1). mean of XY (should be 6):', expectation(zeta));
  report('X ~ N(2, 1), Y ~ N(3, 1). variance of XY (should be 14):', variance(zeta));

  const alpha = fromDensity(chiSquaredDensity(5), { support: [0, Infinity] });
  report(
    'X ~ N(2, 1), Y ~ chisq(5). variance of exp(tanh XY):',
    variance(phi.multiply(alpha).map((x) => Math.exp(Math.tanh(x))))
  );

  const observedProduct = fromObservations(shiftedSamples).multiply(fromObservations(chiSamples));
  report(
    'same, from 1000 draws of each:',
    variance(observedProduct.map((x) => Math.exp(Math.tanh(x))))
  );
  report('mean of chisq(5) draws (should be around 5):', expectation(fromObservations(chiSamples)));

  console.log('\n=== Bayesian composition ===\n');

  const prior = mu;
  const marginal = prior.bind((theta) => fromDensity(normalDensity(theta, 1)));
  report('theta ~ N(0, 1), X | theta ~ N(theta, 1). variance of X (2):', variance(marginal));
}

try {
  measureDemo();
} catch (error) {
  console.error(isMeasureError(error) ? error.toString() : error);
  process.exitCode = 1;
}
