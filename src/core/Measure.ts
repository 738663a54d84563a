/**
 * Core Measure abstraction
 *
 * A measure is represented by its integration functional: give it a
 * measurable function and it returns that function's expectation. Mapping,
 * sequencing and the independent arithmetic below are all function
 * composition over that functional, so no support is ever materialised.
 *
 * Sequencing is what makes Bayesian composition work:
 *
 *   prior.bind(likelihood) == posterior predictive
 */

import { unsupported } from './errors';

/**
 * Real-valued function of an outcome
 */
export type TestFunction<A> = (outcome: A) => number;

/**
 * The integration functional a measure wraps
 */
export type Integrator<A> = (f: TestFunction<A>) => number;

/**
 * Immutable measure over outcomes of type A
 *
 * Nothing checks that the total mass is 1; callers building measures from
 * densities, mass functions or observations are responsible for that.
 */
export class Measure<A> {
  constructor(private readonly integrator: Integrator<A>) {}

  /**
   * Integrate f against this measure
   *
   * Non-finite results are returned as they are.
   */
  apply(f: TestFunction<A>): number {
    return this.integrator(f);
  }

  /**
   * Pushforward (image measure): the distribution of h(X) for X under this measure
   */
  map<B>(h: (outcome: A) => B): Measure<B> {
    return new Measure<B>((g) => this.apply((x) => g(h(x))));
  }

  /**
   * Dependent composition: integrate k(x) against this measure
   */
  bind<B>(k: (outcome: A) => Measure<B>): Measure<B> {
    return new Measure<B>((g) => this.apply((x) => k(x).apply(g)));
  }

  // Arithmetic on independent random variables - all go through combine()

  /**
   * Distribution of X + Y for independent X (this) and Y (other)
   */
  add(this: Measure<number>, other: Measure<number>): Measure<number> {
    return combine(this, other, (x, y) => x + y);
  }

  /**
   * Distribution of X - Y
   */
  subtract(this: Measure<number>, other: Measure<number>): Measure<number> {
    return combine(this, other, (x, y) => x - y);
  }

  /**
   * Distribution of X · Y
   */
  multiply(this: Measure<number>, other: Measure<number>): Measure<number> {
    return combine(this, other, (x, y) => x * y);
  }

  /**
   * There is no measure-valued sign function
   */
  signum(): never {
    return unsupported('signum');
  }

  // Static factory methods

  /**
   * Dirac measure at x; the unit of `bind`
   */
  static pointMass<A>(x: A): Measure<A> {
    return new Measure<A>((f) => f(x));
  }

  /**
   * A numeral has no measure-valued reading
   */
  static fromInteger(_n: number): never {
    return unsupported('fromInteger');
  }
}

/**
 * Measure of op(X, Y) for independent X ~ mu and Y ~ nu
 *
 * Integrates over nu inside mu. The nesting order is fixed so results round
 * the same way every time, even for commutative operators.
 */
export function combine<A, B, C>(
  mu: Measure<A>,
  nu: Measure<B>,
  op: (x: A, y: B) => C
): Measure<C> {
  return new Measure<C>((g) => mu.apply((x) => nu.apply((y) => g(op(x, y)))));
}

// Free-function forms

export function pointMass<A>(x: A): Measure<A> {
  return Measure.pointMass(x);
}

export function map<A, B>(mu: Measure<A>, h: (outcome: A) => B): Measure<B> {
  return mu.map(h);
}

export function sequence<A, B>(mu: Measure<A>, k: (outcome: A) => Measure<B>): Measure<B> {
  return mu.bind(k);
}

export function add(mu: Measure<number>, nu: Measure<number>): Measure<number> {
  return mu.add(nu);
}

export function subtract(mu: Measure<number>, nu: Measure<number>): Measure<number> {
  return mu.subtract(nu);
}

export function multiply(mu: Measure<number>, nu: Measure<number>): Measure<number> {
  return mu.multiply(nu);
}

export function fromNumeral(n: number): never {
  return Measure.fromInteger(n);
}

export function signum<A>(mu: Measure<A>): never {
  return mu.signum();
}
