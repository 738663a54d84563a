/**
 * Seeded random numbers for producing observations
 *
 * The measure core never draws; this is for callers building empirical
 * measures from simulated data.
 */

import { Random, MersenneTwister19937 } from 'random-js';
import { ErrorCode, MeasureError } from '../errors';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private normalCache: number | null = null;

  constructor(seed?: number) {
    const engine =
      seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Standard normal by Box-Muller; the second value of each pair is cached
   */
  normal(): number {
    if (this.normalCache !== null) {
      const value = this.normalCache;
      this.normalCache = null;
      return value;
    }

    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.uniform();
    const u2 = this.uniform();

    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.normalCache = r * Math.sin(theta);
    return r * Math.cos(theta);
  }

  normalDistribution(mean: number, stdDev: number): number {
    if (!(stdDev > 0)) {
      throw new MeasureError(ErrorCode.INVALID_INPUT, 'Standard deviation must be positive', {
        stdDev,
      });
    }
    return mean + stdDev * this.normal();
  }

  exponential(rate: number = 1): number {
    if (!(rate > 0)) {
      throw new MeasureError(ErrorCode.INVALID_INPUT, 'Exponential rate must be positive', {
        rate,
      });
    }
    return -Math.log(1 - this.uniform()) / rate;
  }

  /**
   * Gamma(shape, scale) by squeeze-free Marsaglia-Tsang rejection.
   * Shapes below 1 draw Gamma(shape + 1) and rescale by u^(1/shape).
   */
  gamma(shape: number, scale: number = 1): number {
    if (!(shape > 0) || !(scale > 0)) {
      throw new MeasureError(ErrorCode.INVALID_INPUT, 'Gamma parameters must be positive', {
        shape,
        scale,
      });
    }

    if (shape >= 1) {
      return scale * this.standardGamma(shape);
    }
    return scale * this.standardGamma(shape + 1) * this.uniform() ** (1 / shape);
  }

  private standardGamma(shape: number): number {
    const offset = shape - 1 / 3;
    const spread = 1 / Math.sqrt(9 * offset);

    for (;;) {
      const z = this.normal();
      const base = 1 + spread * z;
      if (base <= 0) continue;

      const cube = base ** 3;
      const accept = 0.5 * z * z + offset * (1 - cube + Math.log(cube));
      if (Math.log(1 - this.uniform()) < accept) {
        return offset * cube;
      }
    }
  }

  /**
   * Chi-squared with the given degrees of freedom, as Gamma(dof/2, 2)
   */
  chiSquared(dof: number): number {
    return this.gamma(dof / 2, 2);
  }

  /**
   * n draws from a sampler
   */
  samples(n: number, draw: (rng: RNG) => number): number[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new MeasureError(ErrorCode.INVALID_INPUT, 'Sample count must be a non-negative integer', {
        n,
      });
    }

    const out: number[] = new Array(n);
    for (let i = 0; i < n; i++) {
      out[i] = draw(this);
    }
    return out;
  }
}
