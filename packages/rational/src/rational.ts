/**
 * Rational Numbers
 *
 * Exact rational arithmetic using bigint numerator and denominator.
 * Every operation returns the reduced form. The sign of the denominator is
 * left as the arithmetic produced it, so a negative denominator can survive
 * reduction.
 *
 * @example
 * ```typescript
 * const half = rational(1n, 2n);
 * const third = rational(1n, 3n);
 * toString(add(half, third)); // "05/6"
 * ```
 */

import { gcd } from "./gcd.js";
import { err, ok, type DivisionByZero, type Result } from "./result.js";

/**
 * Exact rational number represented as num/den.
 * Invariant: gcd(|num|, |den|) = 1 once built through this module.
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

/** Integer operand accepted by the constructors and the integer helpers. */
export type IntegerLike = bigint | number;

function toBigInt(n: IntegerLike): bigint {
  return typeof n === "number" ? BigInt(Math.trunc(n)) : n;
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function reduce(num: bigint, den: bigint): Rational {
  const g = gcd(abs(num), abs(den));
  if (g === 0n) {
    return { num, den };
  }
  return { num: num / g, den: den / g };
}

/**
 * Reduce a rational to lowest terms. Does not touch the sign of either part.
 */
export function normalize(r: Rational): Rational {
  return reduce(r.num, r.den);
}

/**
 * Create a rational number from a numerator and denominator, reduced.
 *
 * @param den - defaults to 1
 * @throws RangeError if the denominator is zero
 */
export function rational(num: IntegerLike, den: IntegerLike = 1n): Rational {
  const d = toBigInt(den);
  if (d === 0n) {
    throw new RangeError("Rational: denominator cannot be zero");
  }
  return reduce(toBigInt(num), d);
}

/** An integer as a rational with denominator 1. */
export function fromInteger(n: IntegerLike): Rational {
  return { num: toBigInt(n), den: 1n };
}

/** 0/1, the default value. */
export function zero(): Rational {
  return { num: 0n, den: 1n };
}

export function one(): Rational {
  return { num: 1n, den: 1n };
}

export function add(a: Rational, b: Rational): Rational {
  return reduce(a.num * b.den + b.num * a.den, a.den * b.den);
}

export function subtract(a: Rational, b: Rational): Rational {
  return reduce(a.num * b.den - b.num * a.den, a.den * b.den);
}

export function multiply(a: Rational, b: Rational): Rational {
  return reduce(a.num * b.num, a.den * b.den);
}

/**
 * Unchecked division.
 *
 * A divisor with a zero denominator is a broken precondition and throws.
 * A zero-valued divisor is NOT caught here; use {@link checkedDivide} for that.
 *
 * @throws RangeError if `b.den` is zero
 */
export function divide(a: Rational, b: Rational): Rational {
  if (b.den === 0n) {
    throw new RangeError("Rational: cannot divide by zero");
  }
  return reduce(a.num * b.den, a.den * b.num);
}

/**
 * Division that reports a zero-valued divisor (numerator 0) as a recoverable error.
 */
export function checkedDivide(a: Rational, b: Rational): Result<Rational, DivisionByZero> {
  if (b.num === 0n) {
    return err<DivisionByZero>({ kind: "DivisionByZero" });
  }
  return ok(divide(a, b));
}

/** Flip the sign of the numerator. */
export function negate(a: Rational): Rational {
  return { num: -a.num, den: a.den };
}

// ============================================================================
// Integer right-hand operands
// ============================================================================

export function addInteger(r: Rational, n: IntegerLike): Rational {
  return reduce(r.num + toBigInt(n) * r.den, r.den);
}

export function subtractInteger(r: Rational, n: IntegerLike): Rational {
  return reduce(r.num - toBigInt(n) * r.den, r.den);
}

export function multiplyInteger(r: Rational, n: IntegerLike): Rational {
  return reduce(r.num * toBigInt(n), r.den);
}

/**
 * Scale the denominator by `n`, then reduce.
 *
 * @throws RangeError if `n` is zero
 */
export function divideInteger(r: Rational, n: IntegerLike): Rational {
  const d = toBigInt(n);
  if (d === 0n) {
    throw new RangeError("Rational: cannot divide by zero");
  }
  return reduce(r.num, r.den * d);
}

// ============================================================================
// Folds and comparison
// ============================================================================

/** Multiply all values together, starting from 1. */
export function product(values: Iterable<Rational>): Rational {
  let acc = one();
  for (const v of values) {
    acc = multiply(acc, v);
  }
  return acc;
}

/** Add all values together, starting from 0. */
export function sum(values: Iterable<Rational>): Rational {
  let acc = zero();
  for (const v of values) {
    acc = add(acc, v);
  }
  return acc;
}

/** Component-wise equality. 1/-2 and -1/2 are not equal here. */
export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

/** Value equality by cross-multiplication. */
export function sameValue(a: Rational, b: Rational): boolean {
  return a.num * b.den === b.num * a.den;
}

/**
 * Display form.
 *
 * Integers print as themselves (a denominator of -1 flips the sign).
 * Anything else prints the truncated quotient, then the remainder, then
 * "/den", with no separator: 7/2 is "31/2" and -7/2 is "-3-1/2".
 */
export function toString(r: Rational): string {
  if (r.den === 1n) {
    return r.num.toString();
  }
  if (r.den === -1n) {
    return (-r.num).toString();
  }
  return `${r.num / r.den}${r.num % r.den}/${r.den}`;
}
