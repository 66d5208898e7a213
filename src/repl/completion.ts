/**
 * Tab completion for the calculator prompt
 */

import { COMMAND_KEYWORDS } from "./commands.js";
import type { CalculatorSession } from "./session.js";

/** Matches plus the text they replace, as node:readline expects */
export type CompletionResult = [string[], string];

/**
 * The word being typed: everything after the last space. `$` is part of it.
 */
export function currentWord(line: string): string {
  const lastSpace = line.lastIndexOf(" ");
  return line.slice(lastSpace + 1);
}

/**
 * Candidates starting with the current word, ignoring case.
 */
export function completeWord(
  line: string,
  candidates: Iterable<string>,
): CompletionResult {
  const word = currentWord(line);
  const prefix = word.toLowerCase();
  const matches = new Set<string>();
  for (const candidate of candidates) {
    if (candidate.toLowerCase().startsWith(prefix)) {
      matches.add(candidate);
    }
  }
  return [[...matches].sort(), word];
}

/**
 * Build a readline completer over command keywords, engine words, the
 * session's named variables and its saved slots.
 */
export function createCompleter(
  session: CalculatorSession,
  engineWords: readonly string[] = [],
): (line: string) => CompletionResult {
  return (line) => {
    const slots = session.archive.slots();
    return completeWord(line, [
      ...COMMAND_KEYWORDS,
      ...engineWords,
      ...session.memory.namedVariables(),
      ...(slots.ok ? slots.value : []),
    ]);
  };
}
