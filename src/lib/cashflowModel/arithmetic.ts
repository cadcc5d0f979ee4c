/**
 * Cashflow Model — Arithmetic
 *
 * The lifetime, projection and NPV stages only ever combine values through
 * this interface, so the same pipeline can run on plain numbers or on
 * symbolic expressions (see expression.ts).
 */

export interface Arithmetic<T> {
  readonly zero: T;
  readonly one: T;
  lift(value: number): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  pow(base: T, exponent: T): T;
  neg(a: T): T;
  /** True only when the value is known to be exactly zero. */
  isZero(a: T): boolean;
}

export const numberArithmetic: Arithmetic<number> = {
  zero: 0,
  one: 1,
  lift: (value) => value,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  pow: (base, exponent) => Math.pow(base, exponent),
  neg: (a) => -a,
  isZero: (a) => a === 0,
};

/** Sum a series with the given arithmetic. Empty series sum to zero. */
export function sumSeries<T>(arith: Arithmetic<T>, series: readonly T[]): T {
  let total = arith.zero;
  for (const value of series) total = arith.add(total, value);
  return total;
}
