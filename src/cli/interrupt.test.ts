import { EventEmitter } from "node:events";
import * as readline from "node:readline/promises";
import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { ReadCancellation } from "./interrupt.js";

describe("ReadCancellation", () => {
  it("should cancel when a watched source receives SIGINT", () => {
    const processLike = new EventEmitter();
    const cancellation = new ReadCancellation();
    cancellation.watch(processLike);

    processLike.emit("SIGINT");

    expect(cancellation.signal.aborted).toBe(true);
    expect(cancellation.interrupted).toBe(true);
  });

  it("should tell end of input from an interrupt", () => {
    const cancellation = new ReadCancellation();
    cancellation.cancel();

    expect(cancellation.signal.aborted).toBe(true);
    expect(cancellation.interrupted).toBe(false);
  });

  it("should stop listening after dispose", () => {
    const terminal = new EventEmitter();
    const processLike = new EventEmitter();
    const cancellation = new ReadCancellation();
    cancellation.watch(terminal);
    cancellation.watch(processLike);

    cancellation.dispose();

    expect(terminal.listenerCount("SIGINT")).toBe(0);
    expect(processLike.listenerCount("SIGINT")).toBe(0);
    processLike.emit("SIGINT");
    expect(cancellation.signal.aborted).toBe(false);
  });

  it("should abort a pending prompt on SIGINT", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const rl = readline.createInterface({ input, output, terminal: false });
    const processLike = new EventEmitter();
    const cancellation = new ReadCancellation();
    cancellation.watch(processLike);

    const pending = rl.question("? ", { signal: cancellation.signal });
    processLike.emit("SIGINT");

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
    rl.close();
    cancellation.dispose();
  });
});
