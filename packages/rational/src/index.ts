/**
 * @qcalc/rational — Exact Rational Arithmetic
 *
 * This package provides:
 * - **Rational**: bigint fractions kept in lowest terms
 * - **Checked division**: zero-valued divisors reported as values, not exceptions
 * - **Prime cache**: the memoized prime sequence behind the trial-division GCD
 *
 * @example
 * ```typescript
 * import { rational, checkedDivide, toString } from "@qcalc/rational";
 *
 * const r = checkedDivide(rational(7), rational(2));
 * if (r.ok) toString(r.value); // "31/2"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Rational Numbers
// ============================================================================

export {
  // Type
  type Rational,
  type IntegerLike,
  // Constructors
  rational,
  fromInteger,
  zero,
  one,
  normalize,
  // Arithmetic
  add,
  subtract,
  multiply,
  divide,
  checkedDivide,
  negate,
  addInteger,
  subtractInteger,
  multiplyInteger,
  divideInteger,
  // Folds and comparison
  product,
  sum,
  equals,
  sameValue,
  // Display
  toString,
} from "./rational.js";

// ============================================================================
// Results
// ============================================================================

export { type Result, type DivisionByZero, ok, err } from "./result.js";

// ============================================================================
// Primes and GCD
// ============================================================================

export { PrimeCache, sharedPrimeCache, primes } from "./primes.js";
export { gcd } from "./gcd.js";
