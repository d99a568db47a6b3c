import type { Readable } from "stream";
import { sharedPrimeCache } from "@qcalc/rational";
import { config } from "../core/config.js";
import { createLogger, type LogSink } from "../core/logger.js";
import { parseArgs, USAGE } from "./args.js";
import { runDriver } from "./driver.js";

/** Streams the CLI talks to; process.stdin/stdout/stderr in production. */
export interface CliIO {
  input: Readable;
  output: LogSink;
  stderr: LogSink & { isTTY?: boolean };
}

/**
 * Run the qcalc command with `argv` (without node and script path).
 * Resolves to the exit code. Arithmetic faults reject.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.stderr.write(`${parsed.message}\n${USAGE}\n`);
    return 1;
  }
  if (parsed.options.help) {
    io.output.write(`${USAGE}\n`);
    return 0;
  }

  const settings = config.getAll();
  const logger = createLogger({
    verbose: parsed.options.verbose ?? settings.verbose,
    color: (parsed.options.color ?? settings.color) && io.stderr.isTTY === true,
    stream: io.stderr,
  });

  for (const warning of config.getWarnings()) {
    logger.warn(warning);
  }
  const configFile = config.getConfigFilePath();
  if (configFile) {
    logger.debug(`Using config: ${configFile}`);
  }

  if (settings.primes.preload > 0) {
    sharedPrimeCache().preload(settings.primes.preload);
    logger.debug(`Preloaded ${settings.primes.preload} primes`);
  }

  await runDriver({ input: io.input, output: io.output, logger });
  logger.debug(`Prime cache holds ${sharedPrimeCache().size} primes`);
  return 0;
}
