/**
 * @qcalc/expr
 *
 * Evaluates single-line arithmetic expressions over exact rationals.
 *
 * Provides:
 * - A tokenizer producing operands and operators from one line
 * - A reducer applying `/ *` before `+ -`, left to right within each tier
 * - Errors as values: DivisionByZero, InvalidSyntax, InvalidExpr
 *
 * @module
 */

// Core types
export type {
  Operator,
  TokenStream,
  InvalidSyntax,
  InvalidExpr,
  EvalError,
} from "./types.js";

// Operators
export { PRECEDENCE, operatorFromChar, compute } from "./operators.js";

// Tokenizer
export { tokenize } from "./tokenizer.js";

// Evaluation
export { reduce, evaluate, describeError } from "./evaluator.js";
