/**
 * Double-exponential quadrature
 *
 * The interval is mapped onto u ∈ (-∞, ∞) by a substitution whose integrand
 * decays double-exponentially, then the trapezoidal rule is applied on
 * [-cutoff, cutoff] with step h = 2^-k, halving h each level:
 *
 * - finite [a, b]:      tanh-sinh,  x = c + r·tanh(π/2·sinh u)
 * - half line [a, ∞):   exp-sinh,   x = a + exp(π/2·sinh u)
 * - half line (-∞, b]:  exp-sinh,   x = b - exp(π/2·sinh u)
 * - whole line:         sinh-sinh,  x = sinh(π/2·sinh u)
 *
 * Endpoint singularities are never evaluated: abscissae that round onto an
 * endpoint are dropped.
 */

import { ErrorCode, MeasureError } from '../errors';

const HALF_PI = Math.PI / 2;

/**
 * Levels computed before the convergence test is trusted
 */
const MIN_LEVELS = 3;

const MAX_LEVELS_LIMIT = 16;

export interface QuadratureOptions {
  /** Relative agreement required between successive levels (absolute below 1) */
  tolerance: number;
  /** Deepest refinement level; bounds the work of every call */
  maxLevels: number;
  /** Half-width of the trapezoid grid in the transformed variable */
  cutoff: number;
}

export const DEFAULT_QUADRATURE_OPTIONS: Readonly<QuadratureOptions> = Object.freeze({
  tolerance: 1e-10,
  maxLevels: 8,
  cutoff: 4,
});

export interface QuadratureResult {
  value: number;
  errorEstimate: number;
  /** Index of the last level computed, starting at 0 */
  levels: number;
  evaluations: number;
  converged: boolean;
}

type Integrand = (x: number) => number;

interface Node {
  x: number;
  weight: number;
}

type Substitution = (u: number) => Node;

/**
 * Merge partial options over the defaults and validate the result
 */
export function resolveQuadratureOptions(
  options: Partial<QuadratureOptions> = {}
): QuadratureOptions {
  // an explicit undefined keeps the default
  const resolved: QuadratureOptions = {
    tolerance: options.tolerance ?? DEFAULT_QUADRATURE_OPTIONS.tolerance,
    maxLevels: options.maxLevels ?? DEFAULT_QUADRATURE_OPTIONS.maxLevels,
    cutoff: options.cutoff ?? DEFAULT_QUADRATURE_OPTIONS.cutoff,
  };

  if (!Number.isFinite(resolved.tolerance) || resolved.tolerance <= 0) {
    throw new MeasureError(ErrorCode.INVALID_CONFIG, 'tolerance must be a positive finite number', {
      option: 'tolerance',
      value: resolved.tolerance,
    });
  }

  if (
    !Number.isInteger(resolved.maxLevels) ||
    resolved.maxLevels < 1 ||
    resolved.maxLevels > MAX_LEVELS_LIMIT
  ) {
    throw new MeasureError(
      ErrorCode.INVALID_CONFIG,
      `maxLevels must be an integer between 1 and ${MAX_LEVELS_LIMIT}`,
      { option: 'maxLevels', value: resolved.maxLevels }
    );
  }

  if (!Number.isFinite(resolved.cutoff) || resolved.cutoff <= 0) {
    throw new MeasureError(ErrorCode.INVALID_CONFIG, 'cutoff must be a positive finite number', {
      option: 'cutoff',
      value: resolved.cutoff,
    });
  }

  return resolved;
}

/**
 * Integrate f over [lower, upper]; either bound may be infinite
 *
 * A non-integrable f does not throw: the estimate diverges to a non-finite
 * value, or refinement stops at maxLevels with `converged: false`.
 */
export function integrate(
  f: Integrand,
  lower: number = -Infinity,
  upper: number = Infinity,
  options: Partial<QuadratureOptions> = {}
): QuadratureResult {
  return integrateResolved(f, lower, upper, resolveQuadratureOptions(options));
}

/**
 * Same as `integrate`, for callers holding already-validated options
 */
export function integrateResolved(
  f: Integrand,
  lower: number,
  upper: number,
  options: QuadratureOptions
): QuadratureResult {
  if (Number.isNaN(lower) || Number.isNaN(upper)) {
    throw new MeasureError(ErrorCode.INVALID_INPUT, 'Integration bounds must not be NaN', {
      lower,
      upper,
    });
  }

  if (lower === upper) {
    return { value: 0, errorEstimate: 0, levels: 0, evaluations: 0, converged: true };
  }

  if (lower > upper) {
    const reversed = integrateResolved(f, upper, lower, options);
    return { ...reversed, value: -reversed.value };
  }

  return refine(f, substitutionFor(lower, upper), lower, upper, options);
}

function substitutionFor(lower: number, upper: number): Substitution {
  const lowerFinite = Number.isFinite(lower);
  const upperFinite = Number.isFinite(upper);

  if (lowerFinite && upperFinite) return tanhSinh(lower, upper);
  if (lowerFinite) return expSinh(lower, 1);
  if (upperFinite) return expSinh(upper, -1);
  return sinhSinh;
}

function tanhSinh(a: number, b: number): Substitution {
  const radius = (b - a) / 2;

  return (u) => {
    const s = HALF_PI * Math.sinh(u);
    const cosh = Math.cosh(s);
    // distance to the nearer endpoint, r·(1 - tanh|s|), without cancellation
    const offset = (2 * radius) / (1 + Math.exp(2 * Math.abs(s)));
    return {
      x: u < 0 ? a + offset : b - offset,
      weight: (radius * HALF_PI * Math.cosh(u)) / (cosh * cosh),
    };
  };
}

function expSinh(origin: number, direction: 1 | -1): Substitution {
  return (u) => {
    const distance = Math.exp(HALF_PI * Math.sinh(u));
    return {
      x: origin + direction * distance,
      weight: distance * HALF_PI * Math.cosh(u),
    };
  };
}

const sinhSinh: Substitution = (u) => {
  const s = HALF_PI * Math.sinh(u);
  return {
    x: Math.sinh(s),
    weight: Math.cosh(s) * HALF_PI * Math.cosh(u),
  };
};

function refine(
  f: Integrand,
  substitution: Substitution,
  lower: number,
  upper: number,
  options: QuadratureOptions
): QuadratureResult {
  const { tolerance, maxLevels, cutoff } = options;

  let sum = 0;
  let evaluations = 0;
  let estimate = 0;
  let errorEstimate = Infinity;

  for (let level = 0; level <= maxLevels; level++) {
    const h = 2 ** -level;
    // every level stops at |u| ≤ cutoff, so the grid stays uniform for fractional cutoffs
    const n = Math.floor(cutoff / h);

    for (let j = -n; j <= n; j++) {
      // coarser levels already hold the even abscissae
      if (level > 0 && j % 2 === 0) continue;

      const { x, weight } = substitution(j * h);
      if (weight === 0 || !(x > lower && x < upper)) continue;

      sum += f(x) * weight;
      evaluations++;
    }

    const previous = estimate;
    estimate = h * sum;

    if (!Number.isFinite(estimate)) {
      return { value: estimate, errorEstimate: NaN, levels: level, evaluations, converged: false };
    }

    if (level > 0) {
      errorEstimate = Math.abs(estimate - previous);
    }

    if (level >= MIN_LEVELS && errorEstimate <= tolerance * Math.max(1, Math.abs(estimate))) {
      return { value: estimate, errorEstimate, levels: level, evaluations, converged: true };
    }
  }

  return { value: estimate, errorEstimate, levels: maxLevels, evaluations, converged: false };
}
