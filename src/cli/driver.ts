import * as readline from "readline";
import type { Readable } from "stream";
import { evaluate, describeError } from "@qcalc/expr";
import type { LogSink, Logger } from "../core/logger.js";
import { formatResult } from "./format.js";

export interface DriverOptions {
  input: Readable;
  output: LogSink;
  logger: Logger;
}

export interface DriverSummary {
  /** Lines evaluated */
  lines: number;
  /** Lines that ended in a recoverable error */
  errors: number;
}

/**
 * Evaluate every line of `input`, writing one result line per input line.
 *
 * Stops at end of input. An error raised by `input` also stops the loop; it is
 * logged and the summary so far is returned. Anything else thrown while
 * evaluating or writing, arithmetic faults included, propagates.
 */
export async function runDriver(options: DriverOptions): Promise<DriverSummary> {
  const { input, output, logger } = options;
  const summary: DriverSummary = { lines: 0, errors: 0 };

  let readError: unknown;
  const onInputError = (error: unknown): void => {
    readError = error;
  };
  input.once("error", onInputError);
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  try {
    for await (const line of rl) {
      summary.lines++;
      const result = evaluate(line);
      if (!result.ok) {
        summary.errors++;
        logger.debug(`line ${summary.lines}: ${describeError(result.error)}`);
      }
      output.write(`${formatResult(result)}\n`);
    }
  } catch (error) {
    if (readError === undefined || error !== readError) {
      throw error;
    }
    logger.error(`Stopped reading input: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    input.off("error", onInputError);
    rl.close();
  }

  logger.debug(
    `Evaluated ${summary.lines} line${summary.lines === 1 ? "" : "s"}, ${summary.errors} error${summary.errors === 1 ? "" : "s"}`,
  );
  return summary;
}
