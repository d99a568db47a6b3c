import { describe, it, expect } from "vitest";
import { Readable } from "stream";
import { runDriver } from "../src/cli/driver.js";
import { createLogger, silentLogger, type LogSink } from "../src/core/logger.js";

class Collector implements LogSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  lines(): string[] {
    return this.chunks.join("").split("\n").slice(0, -1);
  }
}

describe("runDriver", () => {
  it("writes one result line per input line", async () => {
    const output = new Collector();
    const summary = await runDriver({
      input: Readable.from(["23+4\n1/0\n1+x\n\n6/3*2\n"]),
      output,
      logger: silentLogger,
    });

    expect(output.lines()).toEqual([
      "Ok(9)",
      "Err(DivisionByZero)",
      "Err(InvalidSyntax(2))",
      "Err(InvalidExpr)",
      "Ok(4)",
    ]);
    expect(summary).toEqual({ lines: 5, errors: 3 });
  });

  it("strips CRLF terminators and reads a final unterminated line", async () => {
    const output = new Collector();
    await runDriver({
      input: Readable.from(["7/2\r\n", "1-7/2"]),
      output,
      logger: silentLogger,
    });

    expect(output.lines()).toEqual(["Ok(31/2)", "Ok(-2-1/2)"]);
  });

  it("handles empty input", async () => {
    const output = new Collector();
    const summary = await runDriver({ input: Readable.from([]), output, logger: silentLogger });
    expect(output.chunks).toEqual([]);
    expect(summary).toEqual({ lines: 0, errors: 0 });
  });

  it("logs failures and a summary in verbose mode", async () => {
    const log = new Collector();
    await runDriver({
      input: Readable.from(["1+1\n1/0\n"]),
      output: new Collector(),
      logger: createLogger({ verbose: true, color: false, stream: log }),
    });

    expect(log.lines()).toEqual([
      "[qcalc] · line 2: division by zero",
      "[qcalc] · Evaluated 2 lines, 1 error",
    ]);
  });

  it("stops at a read error and returns the summary so far", async () => {
    const input = new Readable({ read() {} });
    const output = new Collector();
    const log = new Collector();
    const sink: LogSink = {
      write(chunk: string) {
        output.write(chunk);
        setImmediate(() => input.destroy(new Error("disk gone")));
        return true;
      },
    };
    input.push("1+1\n");

    const summary = await runDriver({
      input,
      output: sink,
      logger: createLogger({ verbose: false, color: false, stream: log }),
    });

    expect(output.chunks).toEqual(["Ok(2)\n"]);
    expect(log.chunks).toEqual(["[qcalc] ✗ Stopped reading input: disk gone\n"]);
    expect(summary).toEqual({ lines: 1, errors: 0 });
  });

  it("rethrows arithmetic faults raised inside the loop", async () => {
    const sink: LogSink = {
      write() {
        throw new RangeError("denominator is zero");
      },
    };

    await expect(
      runDriver({ input: Readable.from(["1+1\n"]), output: sink, logger: silentLogger }),
    ).rejects.toThrow(RangeError);
  });

  it("rethrows output failures instead of treating them as read errors", async () => {
    const log = new Collector();
    let writes = 0;
    const sink: LogSink = {
      write() {
        if (++writes === 2) {
          throw new TypeError("sink broke");
        }
        return true;
      },
    };

    await expect(
      runDriver({
        input: Readable.from(["1\n2\n3\n"]),
        output: sink,
        logger: createLogger({ verbose: false, color: false, stream: log }),
      }),
    ).rejects.toThrow("sink broke");
    expect(log.chunks).toEqual([]);
  });

  it("replaces invalid UTF-8 bytes and keeps reading", async () => {
    const output = new Collector();
    const summary = await runDriver({
      input: Readable.from([Buffer.from([0x31, 0xff, 0x0a, 0x32, 0x0a])]),
      output,
      logger: silentLogger,
    });

    expect(output.lines()).toEqual(["Err(InvalidSyntax(1))", "Ok(2)"]);
    expect(summary).toEqual({ lines: 2, errors: 1 });
  });
});
