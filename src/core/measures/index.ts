/**
 * Measure constructors
 */

export { fromObservations, identityMeasure } from './Empirical';
export { fromDensity } from './Density';
export type { DensityOptions } from './Density';
export { fromMassFunction } from './MassFunction';
