/**
 * Error kinds reported to the user.
 *
 * None of these end the session: the driver catches them per input line
 * and prints a one-line diagnostic.
 */

/**
 * Error raised when the expression engine rejects an expression
 */
export class EvaluationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EvaluationError";
  }
}

/**
 * Error returned when deleting a variable that does not exist
 */
export class VariableNotFoundError extends Error {
  constructor(public readonly variableName: string) {
    super(`Variable $${variableName} does not exist`);
    this.name = "VariableNotFoundError";
  }
}

/**
 * Error returned when substitution needs more passes than allowed,
 * which almost always means two variables refer to each other
 */
export class InfiniteRecursionError extends Error {
  constructor(public readonly passes: number) {
    super(
      "Possible infinite recursion. Check your variables for a circular reference",
    );
    this.name = "InfiniteRecursionError";
  }
}

export type PersistenceOperation = "save" | "restore" | "list";

/**
 * Error returned when a memory snapshot cannot be written, read or decoded
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: PersistenceOperation,
    public readonly slot: string | undefined,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(reason, options);
    this.name = "PersistenceError";
  }
}

/**
 * Error thrown for invalid command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
