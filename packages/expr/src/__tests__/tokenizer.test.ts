import { describe, it, expect } from "vitest";
import { operatorFromChar, compute, PRECEDENCE, tokenize } from "../index.js";
import { rational } from "@qcalc/rational";

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

describe("operatorFromChar", () => {
  it("maps the four operator characters", () => {
    expect(operatorFromChar("*")).toBe("multiply");
    expect(operatorFromChar("+")).toBe("add");
    expect(operatorFromChar("-")).toBe("subtract");
    expect(operatorFromChar("/")).toBe("divide");
  });

  it("returns undefined for anything else", () => {
    expect(operatorFromChar("x")).toBeUndefined();
    expect(operatorFromChar("constructor")).toBeUndefined();
  });
});

describe("compute", () => {
  it("applies each operator", () => {
    const a = rational(3);
    const b = rational(4);
    expect(compute("multiply", a, b)).toEqual({ ok: true, value: { num: 12n, den: 1n } });
    expect(compute("add", a, b)).toEqual({ ok: true, value: { num: 7n, den: 1n } });
    expect(compute("subtract", a, b)).toEqual({ ok: true, value: { num: -1n, den: 1n } });
    expect(compute("divide", a, b)).toEqual({ ok: true, value: { num: 3n, den: 4n } });
  });

  it("reports division by a zero-valued operand", () => {
    expect(compute("divide", rational(1), rational(0))).toEqual({
      ok: false,
      error: { kind: "DivisionByZero" },
    });
  });
});

describe("PRECEDENCE", () => {
  it("puts division and multiplication before addition and subtraction", () => {
    expect(PRECEDENCE).toEqual([
      ["divide", "multiply"],
      ["add", "subtract"],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

describe("tokenize", () => {
  it("splits operands and operators", () => {
    expect(tokenize("2+3*4")).toEqual({
      ok: true,
      value: {
        operands: [rational(2), rational(3), rational(4)],
        operators: ["add", "multiply"],
      },
    });
  });

  it("sums consecutive digits into one operand", () => {
    const r = tokenize("23+4");
    expect(r).toEqual({
      ok: true,
      value: { operands: [rational(5), rational(4)], operators: ["add"] },
    });
  });

  it("sums longer digit runs the same way", () => {
    const r = tokenize("99");
    expect(r.ok && r.value.operands).toEqual([rational(18)]);
  });

  it("reads zero as 0/1", () => {
    const r = tokenize("0");
    expect(r.ok && r.value.operands).toEqual([{ num: 0n, den: 1n }]);
  });

  it("ignores spaces", () => {
    expect(tokenize(" 1 +  2 ")).toEqual(tokenize("1+2"));
  });

  it("keeps operators that have no operand before them", () => {
    expect(tokenize("+1")).toEqual({
      ok: true,
      value: { operands: [rational(1)], operators: ["add"] },
    });
  });

  it("reports the index of an unknown character", () => {
    expect(tokenize("1+x")).toEqual({ ok: false, error: { kind: "InvalidSyntax", index: 2 } });
    expect(tokenize("\t1")).toEqual({ ok: false, error: { kind: "InvalidSyntax", index: 0 } });
  });

  it("reports syntax before anything else", () => {
    expect(tokenize("1/0+x")).toEqual({ ok: false, error: { kind: "InvalidSyntax", index: 4 } });
  });

  it("rejects a line without a trailing operand", () => {
    expect(tokenize("")).toEqual({ ok: false, error: { kind: "InvalidExpr" } });
    expect(tokenize("   ")).toEqual({ ok: false, error: { kind: "InvalidExpr" } });
    expect(tokenize("1+")).toEqual({ ok: false, error: { kind: "InvalidExpr" } });
    expect(tokenize("*")).toEqual({ ok: false, error: { kind: "InvalidExpr" } });
  });
});
