/**
 * Memory - session variables for the calculator
 *
 * Owns the bindings from variable name to result text, the counter used for
 * auto-named results, and the substitution of `$name` tokens.
 *
 * Bindings live in a Map, so names like `__proto__` or `constructor` are
 * ordinary variables.
 */

import {
  type InfiniteRecursionError,
  VariableNotFoundError,
} from "../errors.js";
import { resolveLimits, type SessionLimits } from "../limits.js";
import { fail, ok, type Result } from "../result.js";
import { isAutoName, LAST_RESULT_NAME } from "./names.js";
import { substituteVariables } from "./substitution.js";

/**
 * Everything a saved memory file holds.
 */
export interface MemorySnapshot {
  bindings: ReadonlyMap<string, string>;
  /** Name the next unnamed result will get; starts at 1 */
  nextAutoName: number;
}

export interface MemoryOptions {
  /**
   * Limits for substitution.
   * See SessionLimits interface for available options.
   */
  limits?: SessionLimits;
}

interface MemoryState {
  bindings: Map<string, string>;
  nextAutoName: number;
}

export class Memory {
  private state: MemoryState = { bindings: new Map(), nextAutoName: 1 };
  private limits: Required<SessionLimits>;

  constructor(options: MemoryOptions = {}) {
    this.limits = resolveLimits(options.limits);
  }

  get size(): number {
    return this.state.bindings.size;
  }

  get nextAutoName(): number {
    return this.state.nextAutoName;
  }

  get(name: string): string | undefined {
    return this.state.bindings.get(name);
  }

  has(name: string): boolean {
    return this.state.bindings.has(name);
  }

  /**
   * Store a value, taking the next auto-name when `name` is undefined.
   * Returns the name the value was stored under.
   */
  store(name: string | undefined, value: string): string {
    let variableName = name;
    if (variableName === undefined) {
      variableName = String(this.state.nextAutoName);
      this.state.nextAutoName++;
    }
    this.state.bindings.set(variableName, value);
    return variableName;
  }

  /**
   * Update `$_`, the most recent evaluation result.
   */
  updateLast(value: string): void {
    this.state.bindings.set(LAST_RESULT_NAME, value);
  }

  delete(name: string): Result<void, VariableNotFoundError> {
    if (!this.state.bindings.delete(name)) {
      return fail(new VariableNotFoundError(name));
    }
    return ok(undefined);
  }

  /**
   * Delete every variable and restart auto-naming at 1.
   */
  clear(): void {
    this.state = { bindings: new Map(), nextAutoName: 1 };
  }

  /**
   * Variables the user named, as `$name`, in insertion order.
   * All-digit names count as auto-named and are left out.
   */
  namedVariables(): string[] {
    const names: string[] = [];
    for (const name of this.state.bindings.keys()) {
      if (!isAutoName(name)) {
        names.push(`$${name}`);
      }
    }
    return names;
  }

  /**
   * Render all variables, sorted by name as plain strings
   * ("10" sorts before "2").
   */
  dump(): string {
    if (this.state.bindings.size === 0) {
      return "  Memory is empty.";
    }

    const names = [...this.state.bindings.keys()].sort((a, b) =>
      a < b ? -1 : a > b ? 1 : 0,
    );

    let table = "";
    for (const name of names) {
      table += `  $${name} = ${this.state.bindings.get(name)}\n`;
    }
    return table;
  }

  substitute(expression: string): Result<string, InfiniteRecursionError> {
    return substituteVariables(
      expression,
      (name) => this.state.bindings.get(name),
      this.limits.maxSubstitutionPasses,
    );
  }

  snapshot(): MemorySnapshot {
    return {
      bindings: new Map(this.state.bindings),
      nextAutoName: this.state.nextAutoName,
    };
  }

  /**
   * Replace the whole state with a decoded snapshot in one assignment.
   */
  replace(snapshot: MemorySnapshot): void {
    this.state = {
      bindings: new Map(snapshot.bindings),
      nextAutoName: snapshot.nextAutoName,
    };
  }
}
