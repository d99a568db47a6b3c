import { err, ok, type Rational, type Result } from "@qcalc/rational";
import { compute, PRECEDENCE } from "./operators.js";
import { tokenize } from "./tokenizer.js";
import type { EvalError, TokenStream } from "./types.js";

/**
 * Collapse a token stream to one value, one precedence tier at a time.
 *
 * Within a tier, each matching operator folds its two neighbouring operands
 * into one, left to right; operators of later tiers are stepped over.
 * The stream's arrays are consumed in place.
 */
export function reduce(stream: TokenStream): Result<Rational, EvalError> {
  const { operands, operators } = stream;
  if (operands.length !== operators.length + 1) {
    return err<EvalError>({ kind: "InvalidExpr" });
  }

  for (const tier of PRECEDENCE) {
    let index = 0;
    while (index < operators.length) {
      const op = operators[index];
      if (!tier.includes(op)) {
        index++;
        continue;
      }
      const result = compute(op, operands[index], operands[index + 1]);
      if (!result.ok) {
        return result;
      }
      operators.splice(index, 1);
      operands.splice(index, 2, result.value);
    }
  }

  return ok(operands[0]);
}

/**
 * Evaluate one line of input.
 *
 * @example
 * ```typescript
 * evaluate("6/3*2"); // { ok: true, value: { num: 4n, den: 1n } }
 * evaluate("1+x");   // { ok: false, error: { kind: "InvalidSyntax", index: 2 } }
 * ```
 */
export function evaluate(line: string): Result<Rational, EvalError> {
  const tokens = tokenize(line);
  if (!tokens.ok) {
    return tokens;
  }
  return reduce(tokens.value);
}

/** Human-readable description of an evaluation error. */
export function describeError(error: EvalError): string {
  switch (error.kind) {
    case "DivisionByZero":
      return "division by zero";
    case "InvalidSyntax":
      return `invalid syntax at index ${error.index}`;
    case "InvalidExpr":
      return "invalid expression";
  }
}
