/**
 * Calculator evaluation
 *
 * Walks a parsed statement and produces the rendered result.
 */

import { EvaluationError } from "../errors.js";
import type {
  CalcBinaryNode,
  CalcCallNode,
  CalcExpr,
  CalcStatement,
  FunctionName,
  Radix,
} from "./ast.js";
import {
  add,
  convert,
  describeUnits,
  displayValue,
  divide,
  formatNumber,
  formatQuantity,
  multiply,
  plainNumber,
  power,
  productFactor,
  type Quantity,
  requireDimensionless,
  unitQuantity,
  type UnitProduct,
} from "./quantity.js";
import { BASE_DIMENSIONS, isDimensionless, sameDimension } from "./units.js";

/** Largest n for which n! is finite */
const MAX_FACTORIAL = 170;

const RADIX_PREFIXES: Record<Radix, string> = {
  2: "0b",
  8: "0o",
  10: "",
  16: "0x",
};

const RADIX_NAMES: Record<Radix, string> = {
  2: "binary",
  8: "octal",
  10: "decimal",
  16: "hex",
};

type PlainFunction = Exclude<
  FunctionName,
  "sqrt" | "cbrt" | "abs" | "floor" | "ceil" | "round"
>;

const PLAIN_FUNCTIONS: Record<PlainFunction, (x: number) => number> = {
  exp: Math.exp,
  ln: Math.log,
  log: Math.log10,
  lg: Math.log2,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
};

export function evaluateStatement(statement: CalcStatement): string {
  const value = evaluateExpr(statement.expression);
  const target = statement.target;

  if (target === null) {
    return formatQuantity(value);
  }
  if (target.type === "Radix") {
    return formatRadix(value, target.radix);
  }
  return formatQuantity(convert(value, target.units));
}

export function evaluateExpr(expr: CalcExpr): Quantity {
  switch (expr.type) {
    case "CalcNumber":
      return plainNumber(expr.value);

    case "CalcUnit":
      return unitQuantity(expr.units);

    case "CalcUnary": {
      const operand = evaluateExpr(expr.operand);
      return expr.operator === "-"
        ? { ...operand, value: -operand.value }
        : operand;
    }

    case "CalcPostfix": {
      const operand = evaluateExpr(expr.operand);
      if (expr.operator === "%") {
        return { ...operand, value: operand.value / 100 };
      }
      return plainNumber(factorial(requireDimensionless(operand, "factorial")));
    }

    case "CalcBinary":
      return applyBinaryOp(
        evaluateExpr(expr.left),
        evaluateExpr(expr.right),
        expr.operator,
      );

    case "CalcCall":
      return callFunction(expr);
  }
}

function applyBinaryOp(
  left: Quantity,
  right: Quantity,
  operator: CalcBinaryNode["operator"],
): Quantity {
  switch (operator) {
    case "+":
      return add(left, right, 1);
    case "-":
      return add(left, right, -1);
    case "*":
      return multiply(left, right);
    case "/":
      return divide(left, right);
    case "%":
      return modulo(left, right);
    case "^":
      return power(left, right);
    case "choose":
      return plainNumber(
        choose(
          requireDimensionless(left, "choose"),
          requireDimensionless(right, "choose"),
        ),
      );
  }
}

function callFunction(expr: CalcCallNode): Quantity {
  const argument = evaluateExpr(expr.argument);
  const name = expr.name;

  switch (name) {
    case "sqrt":
      return root(argument, 2, "square root");
    case "cbrt":
      return root(argument, 3, "cube root");
    case "abs":
      return mapDisplayValue(argument, Math.abs);
    case "floor":
      return mapDisplayValue(argument, Math.floor);
    case "ceil":
      return mapDisplayValue(argument, Math.ceil);
    case "round":
      return mapDisplayValue(argument, Math.round);
    default: {
      const x = requireDimensionless(argument, name);
      const result = PLAIN_FUNCTIONS[name](x);
      if (Number.isNaN(result)) {
        throw new EvaluationError(`Argument out of range for ${name}`);
      }
      return plainNumber(result);
    }
  }
}

/**
 * Apply `fn` to the number as displayed, keeping the units:
 * round(2.6 feet) is 3 feet, not 1 foot.
 */
function mapDisplayValue(q: Quantity, fn: (x: number) => number): Quantity {
  const factor = q.units === null ? 1 : productFactor(q.units);
  return { ...q, value: fn(displayValue(q)) * factor };
}

function root(q: Quantity, degree: 2 | 3, name: string): Quantity {
  const dimension: Quantity["dimension"] = {};
  for (const base of BASE_DIMENSIONS) {
    const exponent = q.dimension[base] ?? 0;
    if (exponent % degree !== 0) {
      throw new EvaluationError(
        `Cannot take the ${name} of ${describeUnits(q)}`,
      );
    }
    if (exponent !== 0) dimension[base] = exponent / degree;
  }

  if (degree === 2 && q.value < 0) {
    throw new EvaluationError("Argument out of range for sqrt");
  }

  let units: UnitProduct | null = null;
  if (q.units !== null && q.units.every((t) => t.power % degree === 0)) {
    units = q.units.map((t) => ({ unit: t.unit, power: t.power / degree }));
  }
  const value = degree === 2 ? Math.sqrt(q.value) : Math.cbrt(q.value);
  return { value, dimension, units };
}

function modulo(a: Quantity, b: Quantity): Quantity {
  if (!sameDimension(a.dimension, b.dimension)) {
    throw new EvaluationError(
      `Cannot take ${describeUnits(a)} modulo ${describeUnits(b)}`,
    );
  }
  if (b.value === 0) {
    throw new EvaluationError("Division by zero");
  }
  return { ...a, value: a.value % b.value, units: a.units ?? b.units };
}

function factorial(n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new EvaluationError(
      "Factorial is only defined for non-negative integers",
    );
  }
  if (n > MAX_FACTORIAL) {
    throw new EvaluationError("Result is not a finite number");
  }
  let result = 1;
  for (let i = 2; i <= n; i++) {
    result *= i;
  }
  return result;
}

function choose(n: number, k: number): number {
  if (!Number.isInteger(n) || !Number.isInteger(k) || n < 0 || k < 0) {
    throw new EvaluationError("choose is only defined for non-negative integers");
  }
  if (k > n) return 0;
  const smaller = Math.min(k, n - k);
  let result = 1;
  for (let i = 1; i <= smaller; i++) {
    result = (result * (n - smaller + i)) / i;
  }
  return Math.round(result);
}

function formatRadix(q: Quantity, radix: Radix): string {
  if (!isDimensionless(q.dimension)) {
    throw new EvaluationError(
      `Cannot convert ${describeUnits(q)} to ${RADIX_NAMES[radix]}`,
    );
  }
  // Dimensionless units (dozen, percent) count as their plain value
  const value = q.value;
  if (radix === 10) {
    return formatNumber(value);
  }
  if (!Number.isSafeInteger(value)) {
    throw new EvaluationError(
      `Only integers can be shown in ${RADIX_NAMES[radix]}`,
    );
  }
  const digits = Math.abs(value).toString(radix).toUpperCase();
  return `${value < 0 ? "-" : ""}${RADIX_PREFIXES[radix]}${digits}`;
}
