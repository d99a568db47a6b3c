/** Outcome of a fallible operation: either a value or a recoverable error. */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Raised by checked division when the divisor is zero-valued. */
export interface DivisionByZero {
  readonly kind: "DivisionByZero";
}

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
