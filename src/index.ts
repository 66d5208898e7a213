export {
  DATA_DIR_NAME,
  resolveShellConfig,
  type ShellConfig,
  type ShellEnv,
  type ShellFlags,
} from "./config.js";
// Expression engine
export {
  type ExpressionEngine,
  UnitCalculator,
  type UnitCalculatorOptions,
} from "./engine/calculator.js";
export {
  type Dimension,
  getDefaultUnitTable,
  type UnitDefinition,
  type UnitFile,
  UnitTable,
} from "./engine/units.js";
export {
  EvaluationError,
  getErrorMessage,
  InfiniteRecursionError,
  PersistenceError,
  type PersistenceOperation,
  UsageError,
  VariableNotFoundError,
} from "./errors.js";
export { resolveLimits, type SessionLimits } from "./limits.js";
// Memory
export {
  isValidVariableName,
  LAST_RESULT_NAME,
  Memory,
  type MemoryOptions,
  type MemorySnapshot,
} from "./memory/index.js";
// Persistence
export {
  DEFAULT_SLOT,
  deserializeSnapshot,
  FileSnapshotStore,
  type FileSnapshotStoreOptions,
  InMemorySnapshotStore,
  MemoryArchive,
  serializeSnapshot,
  type SnapshotStore,
} from "./persistence/index.js";
// Session
export { type Command, classifyLine } from "./repl/commands.js";
export { completeWord, createCompleter } from "./repl/completion.js";
export {
  CalculatorSession,
  type LineResult,
  type SessionLogger,
  type SessionOptions,
} from "./repl/session.js";
export { fail, ok, type Result } from "./result.js";
