export { Memory, type MemoryOptions, type MemorySnapshot } from "./memory.js";
export {
  isAutoName,
  isValidVariableName,
  LAST_RESULT_NAME,
  VARIABLE_NAME_CHARS,
  VARIABLE_NAME_PATTERN,
} from "./names.js";
export {
  type SubstitutionPass,
  substitutePass,
  substituteVariables,
  type VariableLookup,
} from "./substitution.js";
