/**
 * MemoryArchive - save and restore a Memory through a SnapshotStore
 *
 * Restore is all-or-nothing: the snapshot is read and decoded first, and the
 * live memory is replaced only when both steps succeeded.
 */

import type { PersistenceError } from "../errors.js";
import type { Memory } from "../memory/memory.js";
import { ok, type Result } from "../result.js";
import { deserializeSnapshot, serializeSnapshot } from "./codec.js";
import { DEFAULT_SLOT, type SnapshotStore } from "./store.js";

export class MemoryArchive {
  constructor(
    private readonly memory: Memory,
    private readonly store: SnapshotStore,
  ) {}

  get location(): string {
    return this.store.location;
  }

  /**
   * Save the whole memory. Without a slot name the default slot is used.
   * Returns the message to show the user.
   */
  save(slot?: string): Result<string, PersistenceError> {
    const written = this.store.write(
      slot ?? DEFAULT_SLOT,
      serializeSnapshot(this.memory.snapshot()),
    );
    if (!written.ok) return written;

    return ok(
      slot === undefined
        ? "Saved contents of memory."
        : `Saved contents of memory to '${slot}'.`,
    );
  }

  restore(slot?: string): Result<string, PersistenceError> {
    const name = slot ?? DEFAULT_SLOT;
    const contents = this.store.read(name);
    if (!contents.ok) return contents;

    const decoded = deserializeSnapshot(contents.value, name);
    if (!decoded.ok) return decoded;

    this.memory.replace(decoded.value);
    return ok(
      slot === undefined
        ? "Restored contents of memory."
        : `Restored contents of memory from '${slot}'.`,
    );
  }

  slots(): Result<string[], PersistenceError> {
    return this.store.list();
  }
}
