/**
 * Variable name rules shared by memory, persistence and the command classifier.
 */

/** Characters allowed in a variable name */
export const VARIABLE_NAME_CHARS = "[0-9A-Za-z_]";

/** A complete variable name */
export const VARIABLE_NAME_PATTERN = /^[0-9A-Za-z_]+$/;

/** Names given by the auto-increment counter look like this */
const AUTO_NAME_PATTERN = /^[0-9]+$/;

/** Holds the most recent evaluation result */
export const LAST_RESULT_NAME = "_";

export function isValidVariableName(name: string): boolean {
  return VARIABLE_NAME_PATTERN.test(name);
}

/**
 * All-digit names are treated as auto-assigned, even when the user picked
 * them with `$12 = ...`.
 */
export function isAutoName(name: string): boolean {
  return AUTO_NAME_PATTERN.test(name);
}
