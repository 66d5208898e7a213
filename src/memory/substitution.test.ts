import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { InfiniteRecursionError } from "../errors.js";
import {
  substitutePass,
  substituteVariables,
  type VariableLookup,
} from "./substitution.js";

function lookupFrom(bindings: Record<string, string>): VariableLookup {
  const map = new Map(Object.entries(bindings));
  return (name) => map.get(name);
}

const variableName = fc.stringMatching(/^[0-9A-Za-z_]{1,8}$/);

describe("substitutePass", () => {
  it("should replace bound tokens and report the substitution", () => {
    const pass = substitutePass("$a * $b", lookupFrom({ a: "2", b: "3" }));
    expect(pass).toEqual({ text: "2 * 3", substituted: true });
  });

  it("should leave unbound tokens as written", () => {
    const pass = substitutePass("$480 in pounds", lookupFrom({}));
    expect(pass).toEqual({ text: "$480 in pounds", substituted: false });
  });

  it("should match the longest name", () => {
    const pass = substitutePass("$1a", lookupFrom({ "1": "9" }));
    expect(pass).toEqual({ text: "$1a", substituted: false });
  });

  it("should not rescan replacement text within the same pass", () => {
    const pass = substitutePass("$x + $y", lookupFrom({ x: "$y", y: "1" }));
    expect(pass).toEqual({ text: "$y + 1", substituted: true });
  });

  it("should insert values containing $ patterns literally", () => {
    const pass = substitutePass("$x", lookupFrom({ x: "$& $1 $$" }));
    expect(pass.text).toBe("$& $1 $$");
  });

  it("should ignore a lone dollar sign", () => {
    const pass = substitutePass("$ 5 + $", lookupFrom({}));
    expect(pass).toEqual({ text: "$ 5 + $", substituted: false });
  });
});

describe("substituteVariables", () => {
  it("should resolve a variable that refers to another variable", () => {
    const result = substituteVariables(
      "$x + 2",
      lookupFrom({ "1": "4", x: "$1" }),
      100,
    );
    expect(result).toEqual({ ok: true, value: "4 + 2" });
  });

  it("should keep unknown tokens next to resolved ones", () => {
    const result = substituteVariables(
      "$480 + $x",
      lookupFrom({ x: "20" }),
      100,
    );
    expect(result).toEqual({ ok: true, value: "$480 + 20" });
  });

  it("should fail on a binding cycle", () => {
    const result = substituteVariables(
      "$a",
      lookupFrom({ a: "$b", b: "$a" }),
      100,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InfiniteRecursionError);
      expect(result.error.message).toBe(
        "Possible infinite recursion. Check your variables for a circular reference",
      );
    }
  });

  it("should fail on a cycle after exactly the pass cap", () => {
    let lookups = 0;
    const lookup: VariableLookup = (name) => {
      lookups++;
      return name === "a" ? "$a" : undefined;
    };

    const result = substituteVariables("$a", lookup, 5);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.passes).toBe(5);
    }
    // Five allowed passes plus the one that proves a sixth is needed
    expect(lookups).toBe(6);
  });

  it("should resolve a chain exactly as long as the cap", () => {
    const bindings = { a: "$b", b: "$c", c: "$d", d: "1" };
    expect(substituteVariables("$a", lookupFrom(bindings), 4)).toEqual({
      ok: true,
      value: "1",
    });
    expect(substituteVariables("$a", lookupFrom(bindings), 3).ok).toBe(false);
  });

  it("should grow a self-referencing value until the cap", () => {
    const result = substituteVariables("$n", lookupFrom({ n: "$n+1" }), 10);
    expect(result.ok).toBe(false);
  });

  it("should return text without tokens unchanged", () => {
    fc.assert(
      fc.property(
        fc.string().filter((s) => !s.includes("$")),
        (text) => {
          const result = substituteVariables(text, lookupFrom({ x: "1" }), 100);
          expect(result).toEqual({ ok: true, value: text });
        },
      ),
    );
  });

  it("should resolve any acyclic chain to the final value", () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(variableName, { minLength: 1, maxLength: 10 }),
        fc.integer({ min: 0, max: 1_000_000 }),
        (names, end) => {
          const map = new Map<string, string>();
          names.forEach((name, i) => {
            const next = names[i + 1];
            map.set(name, next === undefined ? String(end) : `$${next}`);
          });

          const result = substituteVariables(
            `$${names[0]}`,
            (name) => map.get(name),
            names.length,
          );
          expect(result).toEqual({ ok: true, value: String(end) });
        },
      ),
    );
  });
});
