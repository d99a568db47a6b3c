import {
  add,
  checkedDivide,
  multiply,
  ok,
  subtract,
  type DivisionByZero,
  type Rational,
  type Result,
} from "@qcalc/rational";
import type { Operator } from "./types.js";

const OPERATOR_CHARS: Readonly<Record<string, Operator>> = {
  "*": "multiply",
  "+": "add",
  "-": "subtract",
  "/": "divide",
};

/**
 * Precedence tiers, highest first. Operators within a tier apply left to right.
 */
export const PRECEDENCE: readonly (readonly Operator[])[] = [
  ["divide", "multiply"],
  ["add", "subtract"],
];

/** Map an input character to its operator, or undefined if it is not one. */
export function operatorFromChar(c: string): Operator | undefined {
  return Object.hasOwn(OPERATOR_CHARS, c) ? OPERATOR_CHARS[c] : undefined;
}

/**
 * Apply an operator. Only division can fail, when the divisor is zero-valued.
 */
export function compute(op: Operator, a: Rational, b: Rational): Result<Rational, DivisionByZero> {
  switch (op) {
    case "multiply":
      return ok(multiply(a, b));
    case "add":
      return ok(add(a, b));
    case "subtract":
      return ok(subtract(a, b));
    case "divide":
      return checkedDivide(a, b);
  }
}
