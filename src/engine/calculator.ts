/**
 * Expression engines
 *
 * The session only needs `evaluate`: text in, rendered result or an
 * EvaluationError out. UnitCalculator is the engine the CLI uses.
 */

import { EvaluationError, getErrorMessage } from "../errors.js";
import { fail, ok, type Result } from "../result.js";
import { evaluateStatement } from "./evaluator.js";
import { parseStatement } from "./parser.js";
import { getDefaultUnitTable, type UnitTable } from "./units.js";

export interface ExpressionEngine {
  evaluate(expression: string): Result<string, EvaluationError>;
}

export interface UnitCalculatorOptions {
  /** Defaults to the table in units.json */
  units?: UnitTable;
}

const BARE_NUMBER = /^ *([0-9]*\.?[0-9]+|[0-9]+\.?[0-9]*) *$/;

/** `1 000 000` is one number */
const DIGIT_GROUP_SPACE = /(\d) (?=\d)/g;

const FUNCTION_WORDS = [
  "sqrt",
  "cbrt",
  "abs",
  "exp",
  "ln",
  "log",
  "lg",
  "sin",
  "cos",
  "tan",
  "asin",
  "acos",
  "atan",
  "sinh",
  "cosh",
  "tanh",
  "floor",
  "ceil",
  "round",
  "pi",
  "choose",
  "hex",
  "binary",
  "octal",
  "decimal",
];

export class UnitCalculator implements ExpressionEngine {
  private readonly unitTable?: UnitTable;

  constructor(options: UnitCalculatorOptions = {}) {
    this.unitTable = options.units;
  }

  evaluate(expression: string): Result<string, EvaluationError> {
    const bare = BARE_NUMBER.exec(expression);
    if (bare) {
      return ok(bare[1]);
    }

    const text = expression.replace(DIGIT_GROUP_SPACE, "$1");
    try {
      const statement = parseStatement(text, this.units);
      return ok(evaluateStatement(statement));
    } catch (error) {
      if (error instanceof EvaluationError) {
        return fail(error);
      }
      // e.g. units.json missing or malformed
      return fail(new EvaluationError(getErrorMessage(error), { cause: error }));
    }
  }

  /** Function, constant and unit words, for tab completion */
  words(): string[] {
    return [...FUNCTION_WORDS, ...this.units.words()];
  }

  private get units(): UnitTable {
    return this.unitTable ?? getDefaultUnitTable();
  }
}
