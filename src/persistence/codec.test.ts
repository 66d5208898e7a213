import fc from "fast-check";
import { describe, expect, it } from "vitest";
import YAML from "yaml";
import { PersistenceError } from "../errors.js";
import { deserializeSnapshot, serializeSnapshot } from "./codec.js";

describe("snapshot codec", () => {
  it("should write bindings as an ordered sequence", () => {
    const text = serializeSnapshot({
      bindings: new Map([
        ["1", "4"],
        ["x", "$1"],
      ]),
      nextAutoName: 2,
    });
    expect(YAML.parse(text)).toEqual({
      version: 1,
      nextAutoName: 2,
      bindings: [
        { name: "1", value: "4" },
        { name: "x", value: "$1" },
      ],
    });
  });

  it("should read a hand-written snapshot", () => {
    const text = [
      "version: 1",
      "nextAutoName: 4",
      "bindings:",
      "  - name: 3",
      "    value: 12.5",
      "  - name: rate",
      "    value: 5 miles per hour",
      "",
    ].join("\n");

    const result = deserializeSnapshot(text);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect([...result.value.bindings]).toEqual([
        ["3", "12.5"],
        ["rate", "5 miles per hour"],
      ]);
      expect(result.value.nextAutoName).toBe(4);
    }
  });

  it("should treat missing bindings as empty", () => {
    const result = deserializeSnapshot("version: 1\nnextAutoName: 1\n");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.bindings.size).toBe(0);
    }
  });

  it("should round-trip the empty memory", () => {
    const result = deserializeSnapshot(
      serializeSnapshot({ bindings: new Map(), nextAutoName: 1 }),
    );
    expect(result).toEqual({
      ok: true,
      value: { bindings: new Map(), nextAutoName: 1 },
    });
  });

  it("should round-trip any valid memory", () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(
          fc.tuple(fc.stringMatching(/^[0-9A-Za-z_]{1,10}$/), fc.string()),
          { selector: ([name]) => name, maxLength: 20 },
        ),
        fc.integer({ min: 1, max: 1_000_000 }),
        (entries, nextAutoName) => {
          const snapshot = { bindings: new Map(entries), nextAutoName };
          const result = deserializeSnapshot(serializeSnapshot(snapshot));
          expect(result).toEqual({ ok: true, value: snapshot });
        },
      ),
    );
  });

  it("should keep prototype property names as plain variables", () => {
    const result = deserializeSnapshot(
      serializeSnapshot({
        bindings: new Map([
          ["__proto__", "1"],
          ["constructor", "2"],
        ]),
        nextAutoName: 1,
      }),
    );
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.bindings.get("__proto__")).toBe("1");
      expect(result.value.bindings.get("constructor")).toBe("2");
    }
  });

  describe("invalid input", () => {
    it("should reject text that is not YAML", () => {
      const result = deserializeSnapshot("bindings: [", "broken");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PersistenceError);
        expect(result.error.message).toBe("file is not valid YAML");
        expect(result.error.operation).toBe("restore");
        expect(result.error.slot).toBe("broken");
      }
    });

    it("should reject an invalid variable name", () => {
      const text = [
        "version: 1",
        "nextAutoName: 1",
        "bindings:",
        "  - name: bad-name",
        "    value: '1'",
        "",
      ].join("\n");
      const result = deserializeSnapshot(text);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          "file is not a memory snapshot (invalid variable name at bindings.0.name)",
        );
      }
    });

    it("should reject duplicate names", () => {
      const text = [
        "version: 1",
        "nextAutoName: 1",
        "bindings:",
        "  - { name: x, value: '1' }",
        "  - { name: x, value: '2' }",
        "",
      ].join("\n");
      const result = deserializeSnapshot(text);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          "file is not a memory snapshot (duplicate variable $x)",
        );
      }
    });

    it("should reject an unknown version", () => {
      const result = deserializeSnapshot("version: 2\nnextAutoName: 1\n");
      expect(result.ok).toBe(false);
    });

    it("should reject a counter below 1", () => {
      const result = deserializeSnapshot("version: 1\nnextAutoName: 0\n");
      expect(result.ok).toBe(false);
    });

    it("should reject an empty file", () => {
      const result = deserializeSnapshot("");
      expect(result.ok).toBe(false);
    });
  });
});
