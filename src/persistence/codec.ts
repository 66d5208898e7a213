/**
 * Snapshot codec
 *
 * Memory snapshots are stored as YAML:
 *
 * ```yaml
 * version: 1
 * nextAutoName: 3
 * bindings:
 *   - name: "1"
 *     value: "4"
 *   - name: x
 *     value: $1
 * ```
 *
 * Bindings are a sequence rather than a mapping so that insertion order
 * survives and names never become object keys.
 */

import YAML from "yaml";
import { z } from "zod";
import { PersistenceError } from "../errors.js";
import type { MemorySnapshot } from "../memory/memory.js";
import { VARIABLE_NAME_PATTERN } from "../memory/names.js";
import { fail, ok, type Result } from "../result.js";

export const SNAPSHOT_VERSION = 1;

// Hand-edited files may hold bare numbers; keep them as their decimal text
const textSchema = z.union([
  z.string(),
  z.number().transform((n) => String(n)),
]);

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  nextAutoName: z.number().int().positive(),
  bindings: z
    .array(
      z.object({
        name: textSchema.pipe(
          z.string().regex(VARIABLE_NAME_PATTERN, "invalid variable name"),
        ),
        value: textSchema,
      }),
    )
    .default([]),
});

export function serializeSnapshot(snapshot: MemorySnapshot): string {
  const document = {
    version: SNAPSHOT_VERSION,
    nextAutoName: snapshot.nextAutoName,
    bindings: [...snapshot.bindings].map(([name, value]) => ({ name, value })),
  };
  return YAML.stringify(document);
}

/**
 * Decode snapshot text. Never touches live memory; the caller swaps the
 * result in only when decoding succeeded.
 */
export function deserializeSnapshot(
  text: string,
  slot?: string,
): Result<MemorySnapshot, PersistenceError> {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    return fail(
      new PersistenceError("restore", slot, "file is not valid YAML", {
        cause: error,
      }),
    );
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(
      new PersistenceError(
        "restore",
        slot,
        `file is not a memory snapshot (${describeIssue(parsed.error)})`,
        { cause: parsed.error },
      ),
    );
  }

  const bindings = new Map<string, string>();
  for (const { name, value } of parsed.data.bindings) {
    if (bindings.has(name)) {
      return fail(
        new PersistenceError(
          "restore",
          slot,
          `file is not a memory snapshot (duplicate variable $${name})`,
        ),
      );
    }
    bindings.set(name, value);
  }

  return ok({ bindings, nextAutoName: parsed.data.nextAutoName });
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid";
  }
  if (issue.path.length === 0) {
    return issue.message;
  }
  return `${issue.message} at ${issue.path.join(".")}`;
}
