import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

const defs = {
  quiet: { short: "q", long: "quiet", type: "boolean" as const },
  verbose: { short: "V", long: "verbose", type: "boolean" as const },
  expression: { short: "e", long: "expression", type: "string" as const },
  dataDir: { long: "data-dir", type: "string" as const },
};

describe("parseArgs", () => {
  it("should default booleans to false and strings to undefined", () => {
    const result = parseArgs([], defs);
    expect(result).toEqual({
      ok: true,
      value: {
        flags: {
          quiet: false,
          verbose: false,
        },
        positional: [],
      },
    });
  });

  it("should parse long and combined short flags", () => {
    const result = parseArgs(["-qV"], defs);
    expect(result.ok && result.value.flags.quiet).toBe(true);
    expect(result.ok && result.value.flags.verbose).toBe(true);

    const long = parseArgs(["--quiet"], defs);
    expect(long.ok && long.value.flags.quiet).toBe(true);
  });

  it("should take option values in every form", () => {
    for (const args of [
      ["-e", "1 + 1"],
      ["-e1 + 1"],
      ["--expression", "1 + 1"],
      ["--expression=1 + 1"],
    ]) {
      const result = parseArgs(args, defs);
      expect(result.ok && result.value.flags.expression).toBe("1 + 1");
    }
  });

  it("should take a value that starts with a dash", () => {
    const result = parseArgs(["-e", "-5 * 2"], defs);
    expect(result.ok && result.value.flags.expression).toBe("-5 * 2");
  });

  it("should collect positional arguments and stop at --", () => {
    const result = parseArgs(["a", "--", "-q"], defs);
    expect(result.ok && result.value.positional).toEqual(["a", "-q"]);
    expect(result.ok && result.value.flags.quiet).toBe(false);
  });

  it("should reject unknown options", () => {
    const long = parseArgs(["--loud"], defs);
    expect(!long.ok && long.error.message).toBe(
      "unrecognized option '--loud'",
    );

    const short = parseArgs(["-qx"], defs);
    expect(!short.ok && short.error.message).toBe("invalid option -- 'x'");
  });

  it("should reject options missing their value", () => {
    const long = parseArgs(["--data-dir"], defs);
    expect(!long.ok && long.error.message).toBe(
      "option '--data-dir' requires an argument",
    );

    const short = parseArgs(["-e"], defs);
    expect(!short.ok && short.error.message).toBe(
      "option requires an argument -- 'e'",
    );
  });

  it("should reject a value on a boolean flag", () => {
    const result = parseArgs(["--quiet=yes"], defs);
    expect(!result.ok && result.error.message).toBe(
      "option '--quiet' doesn't allow an argument",
    );
  });
});
