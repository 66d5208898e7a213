/**
 * Quantities
 *
 * A quantity is a magnitude in SI base units, its dimension, and optionally
 * the units it should be shown in. Plain numbers are dimensionless
 * quantities without display units.
 */

import { EvaluationError } from "../errors.js";
import {
  combineDimensions,
  type Dimension,
  formatDimension,
  formatTerms,
  isDimensionless,
  sameDimension,
  scaleDimension,
  type UnitDefinition,
} from "./units.js";

export interface UnitTerm {
  unit: UnitDefinition;
  power: number;
}

/** Units a quantity is displayed in, e.g. [mile^1, hour^-1] */
export type UnitProduct = ReadonlyArray<UnitTerm>;

export interface Quantity {
  /** Magnitude in SI base units */
  value: number;
  dimension: Dimension;
  units: UnitProduct | null;
}

const SIGNIFICANT_DIGITS = 12;

export function plainNumber(value: number): Quantity {
  return { value, dimension: {}, units: null };
}

export function unitQuantity(units: UnitProduct): Quantity {
  return {
    value: productFactor(units),
    dimension: productDimension(units),
    units,
  };
}

export function productFactor(units: UnitProduct): number {
  let factor = 1;
  for (const term of units) {
    factor *= term.unit.factor ** term.power;
  }
  return factor;
}

export function productDimension(units: UnitProduct): Dimension {
  let dimension: Dimension = {};
  for (const term of units) {
    dimension = combineDimensions(
      dimension,
      scaleDimension(term.unit.dimension, term.power),
      1,
    );
  }
  return dimension;
}

/**
 * Units of a * b^sign, merging repeated units and dropping zero powers.
 */
function combineProducts(
  a: UnitProduct,
  b: UnitProduct,
  sign: 1 | -1,
): UnitProduct {
  const terms: UnitTerm[] = a.map((term) => ({ ...term }));
  for (const term of b) {
    const existing = terms.find((t) => t.unit === term.unit);
    if (existing) {
      existing.power += sign * term.power;
    } else {
      terms.push({ unit: term.unit, power: sign * term.power });
    }
  }
  return terms.filter((t) => t.power !== 0);
}

/**
 * Display units of a product or quotient. Dimensionless units (percent,
 * dozen, degree) are folded into the number.
 */
function combineUnits(
  a: Quantity,
  b: Quantity,
  sign: 1 | -1,
): UnitProduct | null {
  const combined = combineProducts(
    dimensionalTerms(a.units),
    dimensionalTerms(b.units),
    sign,
  );
  // min/s is a plain number
  if (combined.length === 0 || isDimensionless(productDimension(combined))) {
    return null;
  }
  return combined;
}

function dimensionalTerms(units: UnitProduct | null): UnitProduct {
  return (units ?? []).filter((term) => !isDimensionless(term.unit.dimension));
}

export function describeUnits(q: Quantity): string {
  if (q.units !== null) {
    if (q.units.length === 1 && q.units[0].power === 1) {
      return q.units[0].unit.plural;
    }
    return formatProduct(q.units);
  }
  return isDimensionless(q.dimension)
    ? "plain numbers"
    : formatDimension(q.dimension);
}

export function add(a: Quantity, b: Quantity, sign: 1 | -1): Quantity {
  if (!sameDimension(a.dimension, b.dimension)) {
    const verb = sign === 1 ? "add" : "subtract";
    throw new EvaluationError(
      `Cannot ${verb} ${describeUnits(b)} ${sign === 1 ? "to" : "from"} ${describeUnits(a)}`,
    );
  }
  return {
    value: a.value + sign * b.value,
    dimension: a.dimension,
    units: a.units ?? b.units,
  };
}

export function multiply(a: Quantity, b: Quantity): Quantity {
  return {
    value: a.value * b.value,
    dimension: combineDimensions(a.dimension, b.dimension, 1),
    units: combineUnits(a, b, 1),
  };
}

export function divide(a: Quantity, b: Quantity): Quantity {
  if (b.value === 0) {
    throw new EvaluationError("Division by zero");
  }
  return {
    value: a.value / b.value,
    dimension: combineDimensions(a.dimension, b.dimension, -1),
    units: combineUnits(a, b, -1),
  };
}

export function power(base: Quantity, exponent: Quantity): Quantity {
  requireDimensionless(exponent, "an exponent");
  const n = exponent.value;
  if (!isDimensionless(base.dimension) && !Number.isInteger(n)) {
    throw new EvaluationError(
      `Cannot raise ${describeUnits(base)} to a fractional power`,
    );
  }
  return {
    value: base.value ** n,
    dimension: scaleDimension(base.dimension, n),
    units:
      base.units === null
        ? null
        : base.units.map((term) => ({ unit: term.unit, power: term.power * n })),
  };
}

/**
 * Show `q` in `units`; the dimensions must match.
 */
export function convert(q: Quantity, units: UnitProduct): Quantity {
  const dimension = productDimension(units);
  if (!sameDimension(q.dimension, dimension)) {
    throw new EvaluationError(
      `Cannot convert ${describeUnits(q)} to ${describeUnits({ value: 1, dimension, units })}`,
    );
  }
  return { value: q.value, dimension, units };
}

export function requireDimensionless(q: Quantity, role: string): number {
  if (!isDimensionless(q.dimension)) {
    throw new EvaluationError(
      `Expected a plain number for ${role}, got ${describeUnits(q)}`,
    );
  }
  return q.value;
}

/**
 * Value of `q` counted in its display units.
 */
export function displayValue(q: Quantity): number {
  return q.units === null ? q.value : q.value / productFactor(q.units);
}

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new EvaluationError("Result is not a finite number");
  }
  const rounded = Number(value.toPrecision(SIGNIFICANT_DIGITS));
  // Avoid printing -0
  return String(rounded === 0 ? 0 : rounded);
}

function formatProduct(units: UnitProduct): string {
  return formatTerms(
    units.map((term) => ({
      symbol: term.unit.symbol ?? term.unit.plural,
      power: term.power,
    })),
  );
}

/**
 * Render a quantity: `3 feet`, `1 foot`, `5 mi/h`, `12 m^2`, `42`.
 */
export function formatQuantity(q: Quantity): string {
  const text = formatNumber(displayValue(q));
  if (q.units !== null) {
    if (q.units.length === 1 && q.units[0].power === 1) {
      const unit = q.units[0].unit;
      return `${text} ${text === "1" ? unit.name : unit.plural}`;
    }
    return `${text} ${formatProduct(q.units)}`;
  }
  if (isDimensionless(q.dimension)) {
    return text;
  }
  return `${text} ${formatDimension(q.dimension)}`;
}
