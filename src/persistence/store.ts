/**
 * Snapshot stores
 *
 * A store keeps serialized memory snapshots under slot names. The file store
 * writes one file per slot into a data directory; the in-memory store keeps
 * them in a Map and is used for embedding and tests.
 */

import * as fs from "node:fs";
import * as nodePath from "node:path";
import { PersistenceError, type PersistenceOperation } from "../errors.js";
import { fail, ok, type Result } from "../result.js";

export const DEFAULT_SLOT = "default";

const SLOT_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export interface SnapshotStore {
  /** Where snapshots live, for messages shown to the user */
  readonly location: string;
  write(slot: string, contents: string): Result<void, PersistenceError>;
  read(slot: string): Result<string, PersistenceError>;
  /** Saved slot names, sorted */
  list(): Result<string[], PersistenceError>;
}

/**
 * Slot names must be a single path segment: no separators, no `.` or `..`.
 */
export function validateSlotName(
  slot: string,
  operation: PersistenceOperation,
): Result<string, PersistenceError> {
  if (!SLOT_NAME_PATTERN.test(slot) || slot === "." || slot === "..") {
    return fail(
      new PersistenceError(operation, slot, `invalid file name '${slot}'`),
    );
  }
  return ok(slot);
}

export interface FileSnapshotStoreOptions {
  /** Directory holding one file per slot; created on first write */
  directory: string;
}

export class FileSnapshotStore implements SnapshotStore {
  readonly location: string;

  constructor(options: FileSnapshotStoreOptions) {
    this.location = nodePath.resolve(options.directory);
  }

  write(slot: string, contents: string): Result<void, PersistenceError> {
    const checked = validateSlotName(slot, "save");
    if (!checked.ok) return checked;

    try {
      fs.mkdirSync(this.location, { recursive: true });
      fs.writeFileSync(this.pathFor(slot), contents, "utf8");
      return ok(undefined);
    } catch (error) {
      return fail(
        new PersistenceError("save", slot, describeFsError(error), {
          cause: error,
        }),
      );
    }
  }

  read(slot: string): Result<string, PersistenceError> {
    const checked = validateSlotName(slot, "restore");
    if (!checked.ok) return checked;

    try {
      return ok(fs.readFileSync(this.pathFor(slot), "utf8"));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return fail(
          new PersistenceError("restore", slot, `no saved file named '${slot}'`, {
            cause: error,
          }),
        );
      }
      return fail(
        new PersistenceError("restore", slot, describeFsError(error), {
          cause: error,
        }),
      );
    }
  }

  list(): Result<string[], PersistenceError> {
    try {
      const entries = fs.readdirSync(this.location, { withFileTypes: true });
      return ok(
        entries
          .filter((entry) => entry.isFile())
          .map((entry) => entry.name)
          .sort(),
      );
    } catch (error) {
      // Nothing has been saved yet
      if (isErrnoException(error) && error.code === "ENOENT") {
        return ok([]);
      }
      return fail(
        new PersistenceError("list", undefined, describeFsError(error), {
          cause: error,
        }),
      );
    }
  }

  private pathFor(slot: string): string {
    return nodePath.join(this.location, slot);
  }
}

export class InMemorySnapshotStore implements SnapshotStore {
  readonly location = "memory";
  private slots = new Map<string, string>();

  write(slot: string, contents: string): Result<void, PersistenceError> {
    const checked = validateSlotName(slot, "save");
    if (!checked.ok) return checked;
    this.slots.set(slot, contents);
    return ok(undefined);
  }

  read(slot: string): Result<string, PersistenceError> {
    const checked = validateSlotName(slot, "restore");
    if (!checked.ok) return checked;
    const contents = this.slots.get(slot);
    if (contents === undefined) {
      return fail(
        new PersistenceError("restore", slot, `no saved file named '${slot}'`),
      );
    }
    return ok(contents);
  }

  list(): Result<string[], PersistenceError> {
    return ok([...this.slots.keys()].sort());
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Keep the errno description and drop the absolute path Node puts in
 * the message.
 */
function describeFsError(error: unknown): string {
  if (isErrnoException(error) && error.code) {
    switch (error.code) {
      case "EACCES":
      case "EPERM":
        return "permission denied";
      case "EISDIR":
        return "is a directory";
      case "ENOTDIR":
        return "not a directory";
      case "ENOSPC":
        return "no space left on device";
      default:
        return error.code;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
