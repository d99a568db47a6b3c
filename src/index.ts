/**
 * qcalc — exact rational expression evaluator
 *
 * Re-exports the arithmetic and evaluator packages together with the line
 * driver used by the `qcalc` command.
 *
 * @example
 * ```typescript
 * import { evaluate, formatResult } from "qcalc";
 *
 * formatResult(evaluate("23+4")); // "Ok(9)"
 * ```
 *
 * @packageDocumentation
 */

export * from "@qcalc/rational";
export * from "@qcalc/expr";

export { formatResult, formatError } from "./cli/format.js";
export { runDriver, type DriverOptions, type DriverSummary } from "./cli/driver.js";
export { run, type CliIO } from "./cli/run.js";
export { parseArgs, USAGE, type CliOptions, type ParsedArgs } from "./cli/args.js";
export { config, defineConfig, type QcalcConfig, type ResolvedConfig, type LoadOptions } from "./core/config.js";
export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogSink } from "./core/logger.js";
