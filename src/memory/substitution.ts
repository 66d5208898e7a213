/**
 * Variable Substitution
 *
 * Replaces `$name` tokens in free-form text with the values bound in memory:
 * - A token is `$` followed by the longest run of [0-9A-Za-z_], so `$1a`
 *   names `1a`, never `$1` followed by `a`
 * - Unbound tokens stay as written, so `$480 in pounds` reaches the engine
 *   untouched
 * - All tokens of one pass are replaced against the same bindings; text
 *   produced by a replacement is only scanned by the next pass
 * - Passes repeat until one replaces nothing, so a value may itself refer
 *   to other variables
 *
 * The number of substituting passes is capped. A cycle such as
 * `$a <= $b`, `$b <= $a` fails with InfiniteRecursionError once the cap
 * is reached.
 */

import { InfiniteRecursionError } from "../errors.js";
import { fail, ok, type Result } from "../result.js";
import { VARIABLE_NAME_CHARS } from "./names.js";

export type VariableLookup = (name: string) => string | undefined;

export interface SubstitutionPass {
  text: string;
  substituted: boolean;
}

/**
 * Run a single simultaneous pass over `text`.
 */
export function substitutePass(
  text: string,
  lookup: VariableLookup,
): SubstitutionPass {
  // A fresh regex per pass: global regexes carry lastIndex between calls
  const tokenPattern = new RegExp(`\\$(${VARIABLE_NAME_CHARS}+)`, "g");
  let substituted = false;

  const result = text.replace(tokenPattern, (token: string, name: string) => {
    const value = lookup(name);
    if (value === undefined) {
      return token;
    }
    substituted = true;
    return value;
  });

  return { text: result, substituted };
}

/**
 * Resolve every bound `$name` token in `expression`, recursively.
 *
 * A chain of exactly `maxPasses` references resolves; needing one more
 * substituting pass is reported as a likely circular reference.
 */
export function substituteVariables(
  expression: string,
  lookup: VariableLookup,
  maxPasses: number,
): Result<string, InfiniteRecursionError> {
  return substituteFromDepth(expression, lookup, maxPasses, 0);
}

function substituteFromDepth(
  expression: string,
  lookup: VariableLookup,
  maxPasses: number,
  depth: number,
): Result<string, InfiniteRecursionError> {
  const pass = substitutePass(expression, lookup);
  if (!pass.substituted) {
    return ok(pass.text);
  }
  if (depth + 1 > maxPasses) {
    return fail(new InfiniteRecursionError(maxPasses));
  }
  return substituteFromDepth(pass.text, lookup, maxPasses, depth + 1);
}
