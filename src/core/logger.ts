/**
 * Diagnostic logging to stderr.
 *
 * stdout is reserved for result lines, so everything here goes to a separate
 * stream with a "[qcalc]" prefix and a status glyph.
 */

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  red: "\x1b[31m",
};

const PREFIX = "[qcalc]";

/** Anything that accepts text, e.g. process.stderr. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  /** Written only in verbose mode. */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
  color: boolean;
  /** Defaults to process.stderr */
  stream?: LogSink;
}

export function createLogger(options: LoggerOptions): Logger {
  const stream = options.stream ?? process.stderr;
  const paint = (color: string, text: string): string =>
    options.color ? `${color}${text}${COLORS.reset}` : text;

  const write = (glyph: string, message: string): void => {
    stream.write(`${PREFIX} ${glyph} ${message}\n`);
  };

  return {
    debug(message) {
      if (options.verbose) {
        write(paint(COLORS.dim, "·"), message);
      }
    },
    info(message) {
      write(paint(COLORS.blue, "ℹ"), message);
    },
    warn(message) {
      write(paint(COLORS.yellow, "⚠"), message);
    },
    error(message) {
      write(paint(COLORS.red, "✗"), message);
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
