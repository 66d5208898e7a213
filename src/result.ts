/**
 * Outcome of an operation that can fail with a user-facing error.
 *
 * Memory, persistence and the expression engine return these instead of
 * throwing; the session renders the error at its per-line boundary.
 *
 * @example
 * const result = memory.delete("x");
 * if (!result.ok) return render(result.error);
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
