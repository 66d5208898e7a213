/**
 * Unit table
 *
 * Units are read from units.json. Each unit has a factor to SI base units and
 * a dimension (exponents of the base quantities). Prefixable units also get
 * SI-prefixed long names (kilometers) and symbols (km).
 */

import * as fs from "node:fs";
import { z } from "zod";

export const BASE_DIMENSIONS = [
  "length",
  "mass",
  "time",
  "current",
  "amount",
  "luminosity",
  "data",
] as const;

export type BaseDimension = (typeof BASE_DIMENSIONS)[number];

/** Exponent per base quantity; missing entries are 0 */
export type Dimension = Partial<Record<BaseDimension, number>>;

/** SI symbol used when a quantity has no display unit */
const BASE_SYMBOLS: Record<BaseDimension, string> = {
  length: "m",
  mass: "kg",
  time: "s",
  current: "A",
  amount: "mol",
  luminosity: "cd",
  data: "bit",
};

export interface UnitDefinition {
  name: string;
  plural: string;
  symbol?: string;
  /** Size of one unit in SI base units */
  factor: number;
  dimension: Dimension;
}

const dimensionSchema = z
  .object({
    length: z.number().int(),
    mass: z.number().int(),
    time: z.number().int(),
    current: z.number().int(),
    amount: z.number().int(),
    luminosity: z.number().int(),
    data: z.number().int(),
  })
  .partial()
  .strict();

const unitFileSchema = z.object({
  prefixes: z.array(
    z.object({
      name: z.string().min(1),
      symbol: z.string().min(1).optional(),
      factor: z.number().positive(),
    }),
  ),
  units: z.array(
    z.object({
      name: z.string().min(1),
      plural: z.string().min(1),
      symbol: z.string().min(1).optional(),
      aliases: z.array(z.string().min(1)).default([]),
      symbols: z.array(z.string().min(1)).default([]),
      factor: z.number().positive(),
      dimension: dimensionSchema,
      prefixable: z.boolean().default(false),
    }),
  ),
});

export type UnitFile = z.input<typeof unitFileSchema>;

export class UnitTable {
  /** Symbols and other case-sensitive spellings */
  private exact = new Map<string, UnitDefinition>();
  /** Long names, keyed in lowercase */
  private names = new Map<string, UnitDefinition>();
  /** Longest spelling, in words */
  readonly maxWords: number;

  constructor(file: UnitFile) {
    const parsed = unitFileSchema.parse(file);
    const generated: Array<[boolean, string, UnitDefinition]> = [];

    for (const entry of parsed.units) {
      const unit: UnitDefinition = {
        name: entry.name,
        plural: entry.plural,
        symbol: entry.symbol,
        factor: entry.factor,
        dimension: entry.dimension,
      };
      for (const name of [entry.name, entry.plural, ...entry.aliases]) {
        this.addName(name, unit);
      }
      for (const symbol of [entry.symbol, ...entry.symbols]) {
        if (symbol !== undefined) this.addSymbol(symbol, unit);
      }

      if (!entry.prefixable) continue;
      for (const prefix of parsed.prefixes) {
        const prefixed: UnitDefinition = {
          name: prefix.name + entry.name,
          plural: prefix.name + entry.plural,
          symbol:
            prefix.symbol !== undefined && entry.symbol !== undefined
              ? prefix.symbol + entry.symbol
              : undefined,
          factor: prefix.factor * entry.factor,
          dimension: entry.dimension,
        };
        for (const name of [entry.name, entry.plural, ...entry.aliases]) {
          generated.push([true, prefix.name + name, prefixed]);
        }
        if (prefixed.symbol !== undefined) {
          generated.push([false, prefixed.symbol, prefixed]);
        }
      }
    }

    // Spelled-out units win over generated prefixed forms
    for (const [isName, spelling, unit] of generated) {
      if (isName && !this.names.has(spelling.toLowerCase())) {
        this.addName(spelling, unit);
      } else if (!isName && !this.exact.has(spelling)) {
        this.addSymbol(spelling, unit);
      }
    }

    let maxWords = 1;
    for (const spelling of [...this.exact.keys(), ...this.names.keys()]) {
      maxWords = Math.max(maxWords, spelling.split(" ").length);
    }
    this.maxWords = maxWords;
  }

  lookup(spelling: string): UnitDefinition | undefined {
    return this.exact.get(spelling) ?? this.names.get(spelling.toLowerCase());
  }

  /** Long unit names, for completion */
  words(): string[] {
    return [...this.names.keys()];
  }

  private addName(name: string, unit: UnitDefinition): void {
    this.names.set(name.toLowerCase(), unit);
  }

  private addSymbol(symbol: string, unit: UnitDefinition): void {
    this.exact.set(symbol, unit);
  }
}

let defaultTable: UnitTable | undefined;

/**
 * The unit table shipped beside this module, loaded on first use.
 */
export function getDefaultUnitTable(): UnitTable {
  if (!defaultTable) {
    const contents = fs.readFileSync(
      new URL("./units.json", import.meta.url),
      "utf8",
    );
    defaultTable = new UnitTable(JSON.parse(contents));
  }
  return defaultTable;
}

export function isDimensionless(dimension: Dimension): boolean {
  return BASE_DIMENSIONS.every((base) => (dimension[base] ?? 0) === 0);
}

export function sameDimension(a: Dimension, b: Dimension): boolean {
  return BASE_DIMENSIONS.every((base) => (a[base] ?? 0) === (b[base] ?? 0));
}

/**
 * Dimension of a * b^sign.
 */
export function combineDimensions(
  a: Dimension,
  b: Dimension,
  sign: 1 | -1,
): Dimension {
  const result: Dimension = {};
  for (const base of BASE_DIMENSIONS) {
    const exponent = (a[base] ?? 0) + sign * (b[base] ?? 0);
    if (exponent !== 0) result[base] = exponent;
  }
  return result;
}

export function scaleDimension(dimension: Dimension, power: number): Dimension {
  const result: Dimension = {};
  for (const base of BASE_DIMENSIONS) {
    const exponent = (dimension[base] ?? 0) * power;
    if (exponent !== 0) result[base] = exponent;
  }
  return result;
}

/**
 * Render a dimension with SI base symbols: `m^2`, `m/s`, `kg m/s^2`, `s^-1`.
 */
export function formatDimension(dimension: Dimension): string {
  return formatTerms(
    BASE_DIMENSIONS.map((base) => ({
      symbol: BASE_SYMBOLS[base],
      power: dimension[base] ?? 0,
    })),
  );
}

export function formatTerms(
  terms: ReadonlyArray<{ symbol: string; power: number }>,
): string {
  const power = (symbol: string, exponent: number) =>
    exponent === 1 ? symbol : `${symbol}^${exponent}`;
  const numerator = terms
    .filter((t) => t.power > 0)
    .map((t) => power(t.symbol, t.power));
  const denominator = terms
    .filter((t) => t.power < 0)
    .map((t) => power(t.symbol, -t.power));

  // `2 s^-1`, never `2 1/s`: rendered results are read back as expressions
  if (numerator.length === 0) {
    return terms
      .filter((t) => t.power < 0)
      .map((t) => power(t.symbol, t.power))
      .join(" ");
  }
  if (denominator.length === 0) return numerator.join(" ");
  return `${numerator.join(" ")}/${denominator.join(" ")}`;
}
