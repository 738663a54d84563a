/**
 * Core measura module exports
 */

// Error handling system
export { MeasureError, ErrorCode, isMeasureError } from './errors';

// Measure type and combinators
export {
  Measure,
  combine,
  pointMass,
  map,
  sequence,
  add,
  subtract,
  multiply,
  fromNumeral,
  signum,
} from './Measure';
export type { TestFunction, Integrator } from './Measure';

// Constructors
export * from './measures';

// Statistics
export {
  volume,
  expectation,
  variance,
  standardDeviation,
  between,
  probability,
  cdf,
} from './statistics';
