import { toString, type Rational, type Result } from "@qcalc/rational";
import type { EvalError } from "@qcalc/expr";

/** Error variant as printed inside `Err(...)`, e.g. `InvalidSyntax(2)`. */
export function formatError(error: EvalError): string {
  switch (error.kind) {
    case "DivisionByZero":
      return "DivisionByZero";
    case "InvalidSyntax":
      return `InvalidSyntax(${error.index})`;
    case "InvalidExpr":
      return "InvalidExpr";
  }
}

/** One output line: `Ok(<value>)` or `Err(<variant>)`. */
export function formatResult(result: Result<Rational, EvalError>): string {
  return result.ok ? `Ok(${toString(result.value)})` : `Err(${formatError(result.error)})`;
}
