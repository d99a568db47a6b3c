export interface CliOptions {
  /** Undefined when the flag was not given, so config decides. */
  verbose?: boolean;
  color?: boolean;
  help: boolean;
}

export type ParsedArgs =
  | { ok: true; options: CliOptions }
  | { ok: false; message: string };

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = { help: false };

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else {
      return { ok: false, message: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, options };
}

export const USAGE = `
qcalc - Exact rational arithmetic, one expression per line

USAGE:
  qcalc [options] < expressions.txt

Reads expressions from stdin and prints Ok(<value>) or Err(<error>) per line.
Digits, + - * / and spaces are accepted; * and / bind tighter than + and -.

OPTIONS:
  -v, --verbose    Log diagnostics to stderr
  --no-color       Disable colors in log output
  -h, --help       Show this help message

CONFIG:
  .qcalcrc(.json|.yaml|.yml), qcalc.config.cjs or a "qcalc" key in package.json
  QCALC_VERBOSE, QCALC_COLOR, QCALC_PRIMES_PRELOAD environment variables

EXAMPLES:
  echo "6/3*2" | qcalc          # Ok(4)
  echo "1+x" | qcalc            # Err(InvalidSyntax(2))
`;
