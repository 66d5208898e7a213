/**
 * memcalc command line: options, help text and the one-shot `-e` mode.
 *
 * Everything here is side-effect free so it can be tested; memcalc.ts wires
 * it to the process.
 */

import type { ShellFlags } from "../config.js";
import type { ExpressionEngine } from "../engine/calculator.js";
import { UsageError } from "../errors.js";
import type { SessionLogger } from "../repl/session.js";
import { fail, ok, type Result } from "../result.js";
import { parseArgs } from "./args.js";

export const VERSION = "2.0.0";

export const VERSION_TEXT = `memcalc ${VERSION}`;

export const HELP_TEXT = `Usage: memcalc [options]

A calculator with units that remembers every result as a $variable.

Options:
  -e, --expression <expr>  Evaluate one expression, print the result and exit
  -q, --quiet              Do not show the banner at startup
      --data-dir <dir>     Directory for saved memory (default: ~/.memcalc)
      --verbose            Trace every line on stderr
  -v, --version            Show the version and exit
  -h, --help               Show this help message

Environment:
  MEMCALC_DATA_DIR                 Directory for saved memory
  MEMCALC_MAX_SUBSTITUTION_PASSES  Substitution passes before giving up (default: 100)
  MEMCALC_VERBOSE=1                Same as --verbose

Examples:
  memcalc -e "3 feet + 2 inches in cm"
  echo "2 ^ 10" | memcalc
`;

const CLI_OPTIONS = {
  help: { short: "h", long: "help", type: "boolean" as const },
  version: { short: "v", long: "version", type: "boolean" as const },
  quiet: { short: "q", long: "quiet", type: "boolean" as const },
  verbose: { long: "verbose", type: "boolean" as const },
  expression: { short: "e", long: "expression", type: "string" as const },
  dataDir: { long: "data-dir", type: "string" as const },
};

export type Invocation =
  | { type: "help" }
  | { type: "version" }
  | { type: "run"; flags: ShellFlags; expression?: string };

export function parseCommandLine(
  argv: string[],
): Result<Invocation, UsageError> {
  const parsed = parseArgs(argv, CLI_OPTIONS);
  if (!parsed.ok) return parsed;

  const { flags, positional } = parsed.value;
  if (flags.help) return ok({ type: "help" });
  if (flags.version) return ok({ type: "version" });

  if (positional.length > 0) {
    return fail(new UsageError(`unexpected argument '${positional[0]}'`));
  }

  return ok({
    type: "run",
    flags: {
      quiet: flags.quiet,
      verbose: flags.verbose,
      dataDir: flags.dataDir,
    },
    expression: flags.expression,
  });
}

export interface OneShotResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * `memcalc -e`: evaluate without memory and report the raw result.
 */
export function evaluateOnce(
  engine: ExpressionEngine,
  expression: string,
): OneShotResult {
  const result = engine.evaluate(expression);
  if (!result.ok) {
    return { stdout: "", stderr: `${result.error.message}\n`, exitCode: 1 };
  }
  return { stdout: `${result.value}\n`, stderr: "", exitCode: 0 };
}

export function usageFailure(error: UsageError): OneShotResult {
  return {
    stdout: "",
    stderr: `memcalc: ${error.message}\n\n${HELP_TEXT}`,
    exitCode: 1,
  };
}

/**
 * Logger that writes one line per event, e.g. `[INFO] store {"name":"1"}`.
 */
export function createLineLogger(write: (line: string) => void): SessionLogger {
  const format = (level: string, message: string, data?: object) =>
    data === undefined
      ? `[${level}] ${message}\n`
      : `[${level}] ${message} ${JSON.stringify(data)}\n`;
  return {
    info: (message, data) => write(format("INFO", message, data)),
    debug: (message, data) => write(format("DEBUG", message, data)),
  };
}
