/**
 * Core types for @qcalc/expr
 *
 * Defines the operators, the token stream produced by the tokenizer, and the
 * recoverable evaluation errors.
 */

import type { DivisionByZero, Rational } from "@qcalc/rational";

/** Binary operator, one per input character `* + - /`. */
export type Operator = "multiply" | "add" | "subtract" | "divide";

/** Operands and operators from one left-to-right scan of a line. */
export interface TokenStream {
  readonly operands: Rational[];
  readonly operators: Operator[];
}

/** An unrecognized character at a zero-based code-point offset. */
export interface InvalidSyntax {
  readonly kind: "InvalidSyntax";
  readonly index: number;
}

/** The line has no trailing operand, or operands and operators do not pair up. */
export interface InvalidExpr {
  readonly kind: "InvalidExpr";
}

/** Recoverable failure while evaluating one line. */
export type EvalError = DivisionByZero | InvalidSyntax | InvalidExpr;
