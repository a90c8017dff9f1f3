/**
 * Guarded math helpers.
 *
 * Every transcendental call and every division in the physics modules goes
 * through one of these so that an undefined operation surfaces as a
 * PermafrostDomainError naming the quantity, never as NaN or Infinity.
 */

import { PermafrostDomainError } from '../errors';

export function requireFinite(value: number, quantity: string): number {
  if (!Number.isFinite(value)) {
    throw new PermafrostDomainError('non_finite', quantity, `result is ${value}`);
  }
  return value;
}

export function guardedDivide(numerator: number, denominator: number, quantity: string): number {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    throw new PermafrostDomainError(
      'division_by_zero',
      quantity,
      `denominator is ${denominator}`,
    );
  }
  return requireFinite(numerator / denominator, quantity);
}

/** arcsin(x) for x in [-1, 1]. */
export function guardedAsin(x: number, quantity: string): number {
  if (!(x >= -1 && x <= 1)) {
    throw new PermafrostDomainError('asin_domain', quantity, `argument ${x} is outside [-1, 1]`);
  }
  return Math.asin(x);
}

/** Natural logarithm for x > 0. */
export function guardedLog(x: number, quantity: string): number {
  if (!(x > 0) || !Number.isFinite(x)) {
    throw new PermafrostDomainError('log_domain', quantity, `argument ${x} is not positive`);
  }
  return Math.log(x);
}

/** Square root for x ≥ 0. */
export function guardedSqrt(x: number, quantity: string): number {
  if (!(x >= 0) || !Number.isFinite(x)) {
    throw new PermafrostDomainError('sqrt_domain', quantity, `argument ${x} is negative`);
  }
  return Math.sqrt(x);
}

/**
 * Weighted geometric mean Π value_i ^ weight_i over the keys of `weights`.
 * `valueOf` must return a positive number for every key.
 */
export function weightedGeometricMean(
  weights: Readonly<Record<string, number>>,
  valueOf: (key: string) => number,
): number {
  let product = 1;
  for (const [key, weight] of Object.entries(weights)) {
    product *= Math.pow(valueOf(key), weight);
  }
  return product;
}
