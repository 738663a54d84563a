/**
 * measura - probability measures as integration functionals
 *
 * A measure is the function that integrates test functions against it.
 * Measures built from samples, densities or mass functions compose by
 * mapping, sequencing and independent arithmetic, and statistics are read
 * off by integrating the right test function.
 */

export * from './core';

// Averaging primitives
export { average, weightedAverage } from './core/math/average';

// Numerical integration
export {
  integrate,
  resolveQuadratureOptions,
  DEFAULT_QUADRATURE_OPTIONS,
} from './core/math/quadrature';
export type { QuadratureOptions, QuadratureResult } from './core/math/quadrature';

// Inputs for the constructors
export { RNG } from './core/math/random';
export {
  normalDensity,
  standardNormalDensity,
  exponentialDensity,
  chiSquaredDensity,
  uniformDensity,
  binomialMass,
  binomialSupport,
} from './core/densities';
export type { Density } from './core/densities';

// Version
export const VERSION = '0.1.0';
