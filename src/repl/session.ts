/**
 * CalculatorSession - runs one input line at a time against memory
 *
 * Each call to `execute` classifies the line, runs it, and returns what to
 * print. Errors never escape `execute`; they are rendered on stderr and the
 * session stays usable.
 */

import { type ExpressionEngine, UnitCalculator } from "../engine/calculator.js";
import { getErrorMessage } from "../errors.js";
import type { SessionLimits } from "../limits.js";
import { Memory } from "../memory/memory.js";
import { MemoryArchive } from "../persistence/archive.js";
import {
  InMemorySnapshotStore,
  type SnapshotStore,
} from "../persistence/store.js";
import { classifyLine, type Command } from "./commands.js";
import { USAGE } from "./usage.js";

/**
 * Logger interface for session tracing.
 * Implement this interface to receive execution logs.
 */
export interface SessionLogger {
  /** Log informational messages (commands, stores, failures) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (substituted text, engine results) */
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface SessionOptions {
  /** Defaults to a fresh Memory using `limits` */
  memory?: Memory;
  /** Defaults to UnitCalculator */
  engine?: ExpressionEngine;
  /** Where save and restore go. Defaults to an in-memory store. */
  store?: SnapshotStore;
  /**
   * Limits for the memory the session creates.
   * See SessionLimits interface for available options.
   */
  limits?: SessionLimits;
  /**
   * Optional logger for session tracing.
   * Disabled by default.
   */
  logger?: SessionLogger;
}

export interface LineResult {
  stdout: string;
  stderr: string;
  /** True once the user asked to leave */
  quit: boolean;
}

export const CLEAR_SCREEN = "\x1b[H\x1b[2J";

const LOST_HINT = '(Lost? Type "quit" or ^C to quit.)';

export class CalculatorSession {
  readonly memory: Memory;
  readonly archive: MemoryArchive;
  private engine: ExpressionEngine;
  private logger?: SessionLogger;

  constructor(options: SessionOptions = {}) {
    this.memory = options.memory ?? new Memory({ limits: options.limits });
    this.engine = options.engine ?? new UnitCalculator();
    this.archive = new MemoryArchive(
      this.memory,
      options.store ?? new InMemorySnapshotStore(),
    );
    this.logger = options.logger;
  }

  execute(line: string): LineResult {
    const command = classifyLine(line);
    this.logger?.info("execute", { command: command.type });

    try {
      return this.run(command);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger?.info("failure", { error: message });
      return output("\n", `  Unexpected error: ${message}\n`);
    }
  }

  private run(command: Command): LineResult {
    switch (command.type) {
      case "Blank":
        return output("");

      case "ClearScreen":
        return output(CLEAR_SCREEN);

      case "Quit":
        return { stdout: "", stderr: "", quit: true };

      case "Help":
        return output(`${USAGE}\n`);

      case "Save": {
        this.logger?.info("save", { slot: command.slot });
        const saved = this.archive.save(command.slot);
        if (!saved.ok) {
          this.logFailure(saved.error);
          return output(
            "\n",
            `  Error saving contents of memory: ${saved.error.message}.\n`,
          );
        }
        return output(`  ${saved.value}\n\n`);
      }

      case "Restore": {
        this.logger?.info("restore", { slot: command.slot });
        const restored = this.archive.restore(command.slot);
        if (!restored.ok) {
          this.logFailure(restored.error);
          return output(
            "\n",
            `  Error restoring memory from file: ${restored.error.message}.\n`,
          );
        }
        return output(`  ${restored.value}\n\n`);
      }

      case "List":
        return this.list();

      case "DeleteAll":
        this.memory.clear();
        return output("  All variables deleted.\n\n");

      case "DeleteVar": {
        const deleted = this.memory.delete(command.name);
        if (!deleted.ok) {
          this.logFailure(deleted.error);
          return output("\n", `  ${deleted.error.message}.\n`);
        }
        return output(`  Variable $${command.name} deleted.\n\n`);
      }

      case "AssignRaw":
        this.memory.store(command.name, command.text);
        this.logger?.info("store", { name: command.name });
        return output(`  $${command.name} = ${command.text}\n\n`);

      case "AssignEval":
        return this.evaluate(command.expression, command.name);

      case "Evaluate":
        return this.evaluate(command.expression, undefined);
    }
  }

  private evaluate(expression: string, name: string | undefined): LineResult {
    const substituted = this.memory.substitute(expression);
    if (!substituted.ok) {
      this.logFailure(substituted.error);
      return lost(substituted.error.message);
    }
    this.logger?.debug("substitute", {
      before: expression,
      after: substituted.value,
    });

    const evaluated = this.engine.evaluate(substituted.value);
    if (!evaluated.ok) {
      this.logFailure(evaluated.error);
      return lost(evaluated.error.message);
    }
    this.logger?.debug("evaluate", { result: evaluated.value });

    this.memory.updateLast(evaluated.value);
    const stored = this.memory.store(name, evaluated.value);
    this.logger?.info("store", { name: stored });
    return output(`  $${stored} = ${evaluated.value}\n\n`);
  }

  private list(): LineResult {
    const dump = this.memory.dump();
    let stdout = dump.endsWith("\n") ? `${dump}\n` : `${dump}\n\n`;

    const slots = this.archive.slots();
    if (!slots.ok) {
      this.logFailure(slots.error);
      return output(
        `${stdout}\n`,
        `  Error listing saved memory files: ${slots.error.message}.\n`,
      );
    }

    if (slots.value.length === 0) {
      stdout += "  There are no saved memory files.\n";
    } else {
      stdout += `  Saved memory files in ${this.archive.location}:\n`;
      for (const slot of slots.value) {
        stdout += `    ${slot}\n`;
      }
    }
    return output(`${stdout}\n`);
  }

  private logFailure(error: Error): void {
    this.logger?.info("failure", { error: error.name, message: error.message });
  }
}

function output(stdout: string, stderr = ""): LineResult {
  return { stdout, stderr, quit: false };
}

function lost(message: string): LineResult {
  return output("\n", `  ${message}. ${LOST_HINT}\n`);
}
