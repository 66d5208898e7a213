export { MemoryArchive } from "./archive.js";
export {
  deserializeSnapshot,
  SNAPSHOT_VERSION,
  serializeSnapshot,
} from "./codec.js";
export {
  DEFAULT_SLOT,
  FileSnapshotStore,
  type FileSnapshotStoreOptions,
  InMemorySnapshotStore,
  type SnapshotStore,
  validateSlotName,
} from "./store.js";
