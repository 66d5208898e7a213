/**
 * Shell configuration
 *
 * Command-line flags win over environment variables, which win over the
 * defaults. Reads nothing itself: the caller passes argv flags, the
 * environment and the home directory.
 */

import * as nodePath from "node:path";
import { resolveLimits, type SessionLimits } from "./limits.js";

export const DATA_DIR_NAME = ".memcalc";

export interface ShellFlags {
  quiet: boolean;
  verbose: boolean;
  dataDir?: string;
}

export type ShellEnv = Readonly<Record<string, string | undefined>>;

export interface ShellConfig {
  /** Directory holding saved memory files */
  dataDir: string;
  limits: Required<SessionLimits>;
  /** Skip the banner */
  quiet: boolean;
  /** Trace the session on stderr */
  verbose: boolean;
}

export function resolveShellConfig(
  flags: ShellFlags,
  env: ShellEnv,
  homeDir: string,
): ShellConfig {
  return {
    dataDir:
      flags.dataDir ||
      env.MEMCALC_DATA_DIR ||
      nodePath.join(homeDir, DATA_DIR_NAME),
    limits: resolveLimits({
      maxSubstitutionPasses: parsePositiveInt(
        env.MEMCALC_MAX_SUBSTITUTION_PASSES,
      ),
    }),
    quiet: flags.quiet,
    verbose: flags.verbose || env.MEMCALC_VERBOSE === "1",
  };
}

/** Undefined unless the whole value is a positive decimal integer */
function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const n = Number.parseInt(value, 10);
  return n > 0 ? n : undefined;
}
