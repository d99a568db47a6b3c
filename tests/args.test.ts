import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("parseArgs", () => {
  it("leaves unset flags to the config", () => {
    expect(parseArgs([])).toEqual({ ok: true, options: { help: false } });
  });

  it("reads short and long flags", () => {
    expect(parseArgs(["-v", "--no-color"])).toEqual({
      ok: true,
      options: { help: false, verbose: true, color: false },
    });
    expect(parseArgs(["--verbose", "-h"])).toEqual({
      ok: true,
      options: { help: true, verbose: true },
    });
  });

  it("rejects unknown options", () => {
    expect(parseArgs(["--fast"])).toEqual({ ok: false, message: "Unknown option: --fast" });
  });
});
