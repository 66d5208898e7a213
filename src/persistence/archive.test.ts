import { describe, expect, it } from "vitest";
import { Memory } from "../memory/memory.js";
import { MemoryArchive } from "./archive.js";
import { InMemorySnapshotStore } from "./store.js";

function setup() {
  const memory = new Memory();
  const store = new InMemorySnapshotStore();
  return { memory, store, archive: new MemoryArchive(memory, store) };
}

describe("MemoryArchive", () => {
  it("should save to the default slot when no name is given", () => {
    const { memory, store, archive } = setup();
    memory.store(undefined, "4");

    expect(archive.save()).toEqual({
      ok: true,
      value: "Saved contents of memory.",
    });
    expect(store.list()).toEqual({ ok: true, value: ["default"] });
  });

  it("should name the slot in the message when one is given", () => {
    const { archive } = setup();
    expect(archive.save("work")).toEqual({
      ok: true,
      value: "Saved contents of memory to 'work'.",
    });
    expect(archive.restore("work")).toEqual({
      ok: true,
      value: "Restored contents of memory from 'work'.",
    });
  });

  it("should replace memory wholesale on restore", () => {
    const { memory, archive } = setup();
    memory.store(undefined, "4");
    memory.store("x", "$1");
    archive.save();

    memory.clear();
    memory.store("other", "1");

    expect(archive.restore()).toEqual({
      ok: true,
      value: "Restored contents of memory.",
    });
    expect(memory.has("other")).toBe(false);
    expect(memory.get("x")).toBe("$1");
    expect(memory.store(undefined, "5")).toBe("2");
  });

  it("should leave memory untouched when the slot is missing", () => {
    const { memory, archive } = setup();
    memory.store("x", "1");

    const result = archive.restore("nothing");

    expect(result.ok).toBe(false);
    expect(memory.get("x")).toBe("1");
    expect(memory.size).toBe(1);
  });

  it("should leave memory untouched when the file cannot be decoded", () => {
    const { memory, store, archive } = setup();
    memory.store(undefined, "1");
    store.write("broken", "version: 1\nnextAutoName: -3\n");

    const result = archive.restore("broken");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.slot).toBe("broken");
    }
    expect(memory.get("1")).toBe("1");
    expect(memory.nextAutoName).toBe(2);
  });

  it("should report saved slots", () => {
    const { archive } = setup();
    archive.save("b");
    archive.save("a");
    expect(archive.slots()).toEqual({ ok: true, value: ["a", "b"] });
    expect(archive.location).toBe("memory");
  });
});
