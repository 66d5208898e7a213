import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FileSnapshotStore,
  InMemorySnapshotStore,
  validateSlotName,
} from "./store.js";

describe("validateSlotName", () => {
  it("should accept simple file names", () => {
    expect(validateSlotName("budget-2024.v1", "save")).toEqual({
      ok: true,
      value: "budget-2024.v1",
    });
  });

  it.each(["../escape", "a/b", ".", "..", "", "a b", "a\\b"])(
    "should reject %j",
    (slot) => {
      const result = validateSlotName(slot, "save");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`invalid file name '${slot}'`);
        expect(result.error.operation).toBe("save");
      }
    },
  );
});

describe("FileSnapshotStore", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "memcalc-store-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should create the data directory on first write", () => {
    const directory = path.join(tempDir, "nested", "data");
    const store = new FileSnapshotStore({ directory });

    const result = store.write("default", "contents");

    expect(result.ok).toBe(true);
    expect(fs.readFileSync(path.join(directory, "default"), "utf8")).toBe(
      "contents",
    );
  });

  it("should read back what was written", () => {
    const store = new FileSnapshotStore({ directory: tempDir });
    store.write("work", "a: 1\n");
    expect(store.read("work")).toEqual({ ok: true, value: "a: 1\n" });
  });

  it("should report a missing slot", () => {
    const store = new FileSnapshotStore({ directory: tempDir });
    const result = store.read("nothing");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("no saved file named 'nothing'");
      expect(result.error.slot).toBe("nothing");
    }
  });

  it("should not read outside the data directory", () => {
    fs.writeFileSync(path.join(tempDir, "secret"), "x");
    const store = new FileSnapshotStore({
      directory: path.join(tempDir, "data"),
    });
    expect(store.read("../secret").ok).toBe(false);
  });

  it("should list saved slots sorted, skipping directories", () => {
    const store = new FileSnapshotStore({ directory: tempDir });
    store.write("b", "");
    store.write("a", "");
    fs.mkdirSync(path.join(tempDir, "sub"));
    expect(store.list()).toEqual({ ok: true, value: ["a", "b"] });
  });

  it("should list nothing when the data directory does not exist", () => {
    const store = new FileSnapshotStore({
      directory: path.join(tempDir, "missing"),
    });
    expect(store.list()).toEqual({ ok: true, value: [] });
  });

  it("should fail to save when the data directory is a file", () => {
    const blocker = path.join(tempDir, "file");
    fs.writeFileSync(blocker, "");
    const store = new FileSnapshotStore({ directory: blocker });
    const result = store.write("default", "x");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.operation).toBe("save");
    }
  });
});

describe("InMemorySnapshotStore", () => {
  it("should keep slots in memory", () => {
    const store = new InMemorySnapshotStore();
    store.write("z", "1");
    store.write("default", "2");
    expect(store.read("z")).toEqual({ ok: true, value: "1" });
    expect(store.list()).toEqual({ ok: true, value: ["default", "z"] });
  });

  it("should report a missing slot", () => {
    const result = new InMemorySnapshotStore().read("default");
    expect(result.ok).toBe(false);
  });
});
