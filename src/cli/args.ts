/**
 * Lightweight argument parser for the memcalc command line.
 *
 * Handles:
 * - Boolean flags: -q, --quiet
 * - Combined short flags: -qv (same as -q -v)
 * - Value options: -e EXPR, -eEXPR, --data-dir=DIR, --data-dir DIR
 * - Positional arguments, and `--` to end option parsing
 * - Unknown option detection
 */

import { UsageError } from "../errors.js";
import { fail, ok, type Result } from "../result.js";

export type ArgType = "boolean" | "string";

export interface ArgDef {
  /** Short form without dash, e.g., "q" for -q */
  short?: string;
  /** Long form without dashes, e.g., "quiet" for --quiet */
  long?: string;
  type: ArgType;
}

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  /** Boolean flags default to false; string options stay undefined unless given */
  flags: {
    [K in keyof T]: T[K]["type"] extends "boolean" ? boolean : string | undefined;
  };
  positional: string[];
}

/**
 * Parse arguments according to the provided definitions.
 *
 * @example
 * const defs = {
 *   quiet: { short: "q", long: "quiet", type: "boolean" as const },
 *   expression: { short: "e", long: "expression", type: "string" as const },
 * };
 * const parsed = parseArgs(process.argv.slice(2), defs);
 * if (!parsed.ok) return usageFailure(parsed.error);
 * const { flags, positional } = parsed.value;
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  args: string[],
  defs: T,
): Result<ParsedArgs<T>, UsageError> {
  const shortToInfo = new Map<string, { name: string; type: ArgType }>();
  const longToInfo = new Map<string, { name: string; type: ArgType }>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { name, type: def.type };
    if (def.short) shortToInfo.set(def.short, info);
    if (def.long) longToInfo.set(def.long, info);
  }

  // Null prototype: option names never reach Object.prototype
  const flags: Record<string, boolean | string | undefined> =
    Object.create(null);
  for (const [name, def] of Object.entries(defs)) {
    if (def.type === "boolean") {
      flags[name] = false;
    }
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const eqIndex = arg.indexOf("=");
      const optName = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
      let optValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);

      const info = longToInfo.get(optName);
      if (!info) {
        return fail(new UsageError(`unrecognized option '${arg}'`));
      }

      if (info.type === "boolean") {
        if (optValue !== undefined) {
          return fail(
            new UsageError(`option '--${optName}' doesn't allow an argument`),
          );
        }
        flags[info.name] = true;
        continue;
      }

      if (optValue === undefined) {
        if (i + 1 >= args.length) {
          return fail(
            new UsageError(`option '--${optName}' requires an argument`),
          );
        }
        optValue = args[++i];
      }
      flags[info.name] = optValue;
      continue;
    }

    const chars = arg.slice(1);
    for (let j = 0; j < chars.length; j++) {
      const c = chars[j];
      const info = shortToInfo.get(c);

      if (!info) {
        return fail(new UsageError(`invalid option -- '${c}'`));
      }

      if (info.type === "boolean") {
        flags[info.name] = true;
        continue;
      }

      // Value is the rest of this argument (-e1+1) or the next one (-e 1+1)
      if (j + 1 < chars.length) {
        flags[info.name] = chars.slice(j + 1);
      } else if (i + 1 < args.length) {
        flags[info.name] = args[++i];
      } else {
        return fail(new UsageError(`option requires an argument -- '${c}'`));
      }
      break;
    }
  }

  return ok({
    flags: flags as ParsedArgs<T>["flags"],
    positional,
  });
}
