/**
 * Line classification for the calculator prompt
 *
 * Rules are tried in order; the first match wins and anything left over is
 * an expression to evaluate. Keywords are case-sensitive.
 */

import { VARIABLE_NAME_CHARS } from "../memory/names.js";

export type Command =
  | { type: "Blank" }
  | { type: "ClearScreen" }
  | { type: "Quit" }
  | { type: "Help" }
  | { type: "Save"; slot?: string }
  | { type: "Restore"; slot?: string }
  | { type: "List" }
  | { type: "DeleteAll" }
  | { type: "DeleteVar"; name: string }
  | { type: "AssignRaw"; name: string; text: string }
  | { type: "AssignEval"; name: string; expression: string }
  | { type: "Evaluate"; expression: string };

interface CommandRule {
  pattern: RegExp;
  build: (match: RegExpExecArray) => Command;
}

const COMMAND_RULES: CommandRule[] = [
  { pattern: /^$/, build: () => ({ type: "Blank" }) },
  { pattern: /^(?:clear|cs)$/, build: () => ({ type: "ClearScreen" }) },
  { pattern: /^(?:q|quit|exit)$/, build: () => ({ type: "Quit" }) },
  { pattern: /^(?:help|wtf)$/, build: () => ({ type: "Help" }) },
  {
    pattern: /^save(?: +(.+))?$/,
    build: (m) => ({ type: "Save", slot: m[1] }),
  },
  {
    pattern: /^(?:restore|load)(?: +(.+))?$/,
    build: (m) => ({ type: "Restore", slot: m[1] }),
  },
  { pattern: /^(?:list|ls)$/, build: () => ({ type: "List" }) },
  { pattern: /^delete +all$/, build: () => ({ type: "DeleteAll" }) },
  {
    pattern: /^delete +\$?(.+)$/,
    build: (m) => ({ type: "DeleteVar", name: m[1] }),
  },
  {
    pattern: new RegExp(`^\\$(${VARIABLE_NAME_CHARS}+) *<= *(.+)$`),
    build: (m) => ({ type: "AssignRaw", name: m[1], text: m[2] }),
  },
  {
    pattern: new RegExp(`^\\$(${VARIABLE_NAME_CHARS}+) *= *(.+)$`),
    build: (m) => ({ type: "AssignEval", name: m[1], expression: m[2] }),
  },
];

/**
 * Keywords offered by tab completion
 */
export const COMMAND_KEYWORDS = [
  "help",
  "list",
  "ls",
  "delete",
  "all",
  "save",
  "restore",
  "load",
  "clear",
  "quit",
  "exit",
];

/**
 * Trim the line and turn tabs into spaces.
 */
export function normalizeLine(line: string): string {
  return line.trim().replace(/\t/g, " ");
}

export function classifyLine(line: string): Command {
  const input = normalizeLine(line);
  for (const rule of COMMAND_RULES) {
    const match = rule.pattern.exec(input);
    if (match) {
      return rule.build(match);
    }
  }
  return { type: "Evaluate", expression: input };
}
