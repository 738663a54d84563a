/**
 * Continuous measures from a density function
 */

import { Measure } from '../Measure';
import { ErrorCode, MeasureError } from '../errors';
import { integrateResolved, resolveQuadratureOptions } from '../math/quadrature';
import type { QuadratureOptions } from '../math/quadrature';

export interface DensityOptions extends Partial<QuadratureOptions> {
  /**
   * Interval carrying the density, either bound possibly infinite.
   * Defaults to the whole real line.
   */
  support?: readonly [number, number];
}

/**
 * Measure whose integral is ∫ f(x)·d(x) dx, computed by double-exponential quadrature
 *
 * The test function is evaluated at every abscissa, including where d(x) is
 * 0, so a NaN or infinite f(x) always reaches the result. Pass `support` to
 * keep f inside the density's domain. A non-integrable f·d yields a
 * non-finite or unconverged value, never an exception.
 */
export function fromDensity(
  d: (x: number) => number,
  options: DensityOptions = {}
): Measure<number> {
  const { support = [-Infinity, Infinity], ...quadrature } = options;
  const [lower, upper] = support;

  if (!(lower < upper)) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, 'Density support must be a non-empty interval', {
      lower,
      upper,
    });
  }

  const resolved = resolveQuadratureOptions(quadrature);

  return new Measure<number>(
    (f) => integrateResolved((x) => f(x) * d(x), lower, upper, resolved).value
  );
}
