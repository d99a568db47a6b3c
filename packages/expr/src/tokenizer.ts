import { addInteger, err, ok, zero, type Rational, type Result } from "@qcalc/rational";
import { operatorFromChar } from "./operators.js";
import type { EvalError, Operator, TokenStream } from "./types.js";

const DIGIT = /^[0-9]$/;

/**
 * Split a line into operands and operators in a single left-to-right scan.
 *
 * Consecutive digits are summed, not read positionally: "23" is the operand 5.
 * Spaces are skipped; any other character is an InvalidSyntax at its code-point index.
 */
export function tokenize(line: string): Result<TokenStream, EvalError> {
  const operands: Rational[] = [];
  const operators: Operator[] = [];
  let current: Rational | undefined;

  let index = 0;
  for (const c of line) {
    if (DIGIT.test(c)) {
      current = addInteger(current ?? zero(), Number(c));
    } else if (c !== " ") {
      const op = operatorFromChar(c);
      if (op === undefined) {
        return err<EvalError>({ kind: "InvalidSyntax", index });
      }
      if (current !== undefined) {
        operands.push(current);
        current = undefined;
      }
      operators.push(op);
    }
    index++;
  }

  if (current === undefined) {
    return err<EvalError>({ kind: "InvalidExpr" });
  }
  operands.push(current);

  return ok({ operands, operators });
}
