#!/usr/bin/env node
/**
 * memcalc - calculator prompt with session memory
 *
 * Usage:
 *   memcalc [options]
 *
 * Reads lines from the terminal (with tab completion), or from piped input
 * when stdin is not a TTY. See `memcalc --help` for the options.
 */

import * as os from "node:os";
import * as readline from "node:readline/promises";
import { resolveShellConfig, type ShellConfig } from "../config.js";
import { UnitCalculator } from "../engine/calculator.js";
import { getErrorMessage } from "../errors.js";
import { FileSnapshotStore } from "../persistence/store.js";
import { type CompletionResult, createCompleter } from "../repl/completion.js";
import { CalculatorSession } from "../repl/session.js";
import { ReadCancellation } from "./interrupt.js";
import {
  createLineLogger,
  evaluateOnce,
  HELP_TEXT,
  type OneShotResult,
  parseCommandLine,
  usageFailure,
  VERSION_TEXT,
} from "./program.js";

// ANSI colors
const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

const PROMPT = "? ";

class MemcalcShell {
  private rl: readline.Interface;
  private isInteractive: boolean;
  private cancellation = new ReadCancellation();

  constructor(
    private session: CalculatorSession,
    private config: ShellConfig,
    completer: (line: string) => CompletionResult,
  ) {
    this.isInteractive = process.stdin.isTTY === true;

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: this.isInteractive,
      completer: this.isInteractive ? completer : undefined,
    });

    // ^C at the terminal arrives on rl; a signal sent to the process, or
    // any SIGINT while input is piped, arrives on process
    this.cancellation.watch(this.rl);
    this.cancellation.watch(process);
    this.cancellation.signal.addEventListener("abort", () => this.rl.close(), {
      once: true,
    });
    this.rl.on("close", () => this.cancellation.cancel());
  }

  get interrupted(): boolean {
    return this.cancellation.interrupted;
  }

  async run(): Promise<void> {
    try {
      if (this.isInteractive) {
        if (!this.config.quiet) {
          this.printWelcome();
        }
        await this.interactive();
      } else {
        await this.piped();
      }
    } finally {
      this.cancellation.dispose();
    }
  }

  private async interactive(): Promise<void> {
    while (true) {
      let line: string;
      try {
        line = await this.rl.question(PROMPT, {
          signal: this.cancellation.signal,
        });
      } catch (error) {
        // closing rl may settle the question before the abort does
        if (isAbortError(error) || this.cancellation.signal.aborted) {
          process.stdout.write("\n");
          this.rl.close();
          return;
        }
        throw error;
      }

      if (!this.executeLine(line)) {
        this.rl.close();
        return;
      }
    }
  }

  private async piped(): Promise<void> {
    // Collect all lines first, then run them in order
    const lines: string[] = [];
    this.rl.on("line", (line) => {
      lines.push(line);
    });
    await new Promise<void>((resolve) => {
      this.rl.on("close", resolve);
    });
    if (this.cancellation.interrupted) return;

    for (const line of lines) {
      if (!this.executeLine(line)) return;
    }
  }

  /** Returns false once the user quits */
  private executeLine(line: string): boolean {
    const result = this.session.execute(line);

    if (result.stderr) {
      process.stderr.write(
        this.isInteractive
          ? `${colors.red}${result.stderr}${colors.reset}`
          : result.stderr,
      );
    }
    if (result.stdout) {
      process.stdout.write(result.stdout);
    }
    return !result.quit;
  }

  private printWelcome(): void {
    process.stdout.write(
      `${colors.cyan}${colors.bold}${VERSION_TEXT}${colors.reset}\n` +
        `Type ${colors.bold}help${colors.reset} for usage, ${colors.bold}quit${colors.reset} or ^C to leave.\n\n`,
    );
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function finish(result: OneShotResult): void {
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

function main(): void {
  const invocation = parseCommandLine(process.argv.slice(2));
  if (!invocation.ok) {
    finish(usageFailure(invocation.error));
    return;
  }

  const run = invocation.value;
  if (run.type === "help") {
    process.stdout.write(HELP_TEXT);
    return;
  }
  if (run.type === "version") {
    process.stdout.write(`${VERSION_TEXT}\n`);
    return;
  }

  const { flags, expression } = run;
  const config = resolveShellConfig(flags, process.env, os.homedir());
  const engine = new UnitCalculator();

  if (expression !== undefined) {
    finish(evaluateOnce(engine, expression));
    return;
  }

  const session = new CalculatorSession({
    engine,
    store: new FileSnapshotStore({ directory: config.dataDir }),
    limits: config.limits,
    logger: config.verbose
      ? createLineLogger((line) => process.stderr.write(line))
      : undefined,
  });
  const shell = new MemcalcShell(
    session,
    config,
    createCompleter(session, engine.words()),
  );

  shell.run().then(
    () => {
      // stdin may still be open behind a pipe
      if (shell.interrupted) process.exit(0);
    },
    (error: unknown) => {
      process.stderr.write(`memcalc: ${getErrorMessage(error)}\n`);
      process.exitCode = 1;
    },
  );
}

main();
