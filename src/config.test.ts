import * as nodePath from "node:path";
import { describe, expect, it } from "vitest";
import { resolveShellConfig } from "./config.js";

const HOME = "/home/test";
const noFlags = { quiet: false, verbose: false };

describe("resolveShellConfig", () => {
  it("should use defaults with no flags or environment", () => {
    expect(resolveShellConfig(noFlags, {}, HOME)).toEqual({
      dataDir: nodePath.join(HOME, ".memcalc"),
      limits: { maxSubstitutionPasses: 100 },
      quiet: false,
      verbose: false,
    });
  });

  it("should prefer --data-dir over MEMCALC_DATA_DIR", () => {
    const env = { MEMCALC_DATA_DIR: "/from/env" };
    expect(resolveShellConfig(noFlags, env, HOME).dataDir).toBe("/from/env");
    expect(
      resolveShellConfig({ ...noFlags, dataDir: "/from/flag" }, env, HOME)
        .dataDir,
    ).toBe("/from/flag");
  });

  it("should read the substitution limit from the environment", () => {
    const config = resolveShellConfig(
      noFlags,
      { MEMCALC_MAX_SUBSTITUTION_PASSES: "12" },
      HOME,
    );
    expect(config.limits.maxSubstitutionPasses).toBe(12);
  });

  it("should ignore substitution limits that are not positive integers", () => {
    for (const value of ["0", "-3", "2.5", "ten", ""]) {
      const config = resolveShellConfig(
        noFlags,
        { MEMCALC_MAX_SUBSTITUTION_PASSES: value },
        HOME,
      );
      expect(config.limits.maxSubstitutionPasses).toBe(100);
    }
  });

  it("should turn on verbose from the flag or MEMCALC_VERBOSE=1", () => {
    expect(
      resolveShellConfig({ ...noFlags, verbose: true }, {}, HOME).verbose,
    ).toBe(true);
    expect(resolveShellConfig(noFlags, { MEMCALC_VERBOSE: "1" }, HOME).verbose)
      .toBe(true);
    expect(resolveShellConfig(noFlags, { MEMCALC_VERBOSE: "0" }, HOME).verbose)
      .toBe(false);
  });

  it("should pass quiet through", () => {
    expect(resolveShellConfig({ ...noFlags, quiet: true }, {}, HOME).quiet).toBe(
      true,
    );
  });
});
