/**
 * Calculator expression AST
 */

import type { UnitProduct } from "./quantity.js";

export type FunctionName =
  | "sqrt"
  | "cbrt"
  | "abs"
  | "exp"
  | "ln"
  | "log"
  | "lg"
  | "sin"
  | "cos"
  | "tan"
  | "asin"
  | "acos"
  | "atan"
  | "sinh"
  | "cosh"
  | "tanh"
  | "floor"
  | "ceil"
  | "round";

export type CalcExpr =
  | CalcNumberNode
  | CalcUnitNode
  | CalcBinaryNode
  | CalcUnaryNode
  | CalcPostfixNode
  | CalcCallNode;

export interface CalcNumberNode {
  type: "CalcNumber";
  value: number;
}

/** Unit word(s) used as a value: `feet`, `light years`, `square meters` */
export interface CalcUnitNode {
  type: "CalcUnit";
  units: UnitProduct;
}

export interface CalcBinaryNode {
  type: "CalcBinary";
  operator: "+" | "-" | "*" | "/" | "%" | "^" | "choose";
  left: CalcExpr;
  right: CalcExpr;
}

export interface CalcUnaryNode {
  type: "CalcUnary";
  operator: "+" | "-";
  operand: CalcExpr;
}

export interface CalcPostfixNode {
  type: "CalcPostfix";
  /** `!` factorial, `%` percent */
  operator: "!" | "%";
  operand: CalcExpr;
}

export interface CalcCallNode {
  type: "CalcCall";
  name: FunctionName;
  argument: CalcExpr;
}

export type Radix = 2 | 8 | 10 | 16;

/** What follows `in` / `to` */
export type ConversionTarget =
  | { type: "Units"; units: UnitProduct }
  | { type: "Radix"; radix: Radix };

/** A whole input line, with its optional conversion */
export interface CalcStatement {
  expression: CalcExpr;
  target: ConversionTarget | null;
}
