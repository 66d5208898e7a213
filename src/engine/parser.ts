/**
 * Calculator Expression Parser
 *
 * Parses lines like:
 * - 2 ^ 10 / 3
 * - 5! + 3 choose 2
 * - 3 feet + 2 inches in centimeters
 * - 60 miles per hour to km/h
 * - sqrt(2) * pi
 * - 255 in hex
 *
 * Precedence, lowest first: conversion (in, to), additive, multiplicative
 * (including x, times, of, mod, per, choose), implicit product (3 feet),
 * unary sign, power (right associative), postfix (!, %, squared, cubed).
 *
 * All functions take the parse context and a position and return the node
 * together with the position after it.
 */

import { EvaluationError } from "../errors.js";
import type {
  CalcExpr,
  CalcStatement,
  ConversionTarget,
  FunctionName,
  Radix,
} from "./ast.js";
import type { UnitTerm } from "./quantity.js";
import type { UnitDefinition, UnitTable } from "./units.js";

interface ParseContext {
  input: string;
  units: UnitTable;
}

type Parsed<T> = { node: T; pos: number };

const FUNCTION_NAMES: Record<string, FunctionName> = {
  sqrt: "sqrt",
  cbrt: "cbrt",
  abs: "abs",
  exp: "exp",
  ln: "ln",
  log: "log",
  lg: "lg",
  sin: "sin",
  cos: "cos",
  tan: "tan",
  asin: "asin",
  arcsin: "asin",
  acos: "acos",
  arccos: "acos",
  atan: "atan",
  arctan: "atan",
  sinh: "sinh",
  cosh: "cosh",
  tanh: "tanh",
  floor: "floor",
  ceil: "ceil",
  round: "round",
};

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  π: Math.PI,
  e: Math.E,
};

const RADIX_WORDS: Record<string, Radix> = {
  hex: 16,
  hexadecimal: 16,
  octal: 8,
  binary: 2,
  decimal: 10,
};

/** Words with a grammatical role; never read as units */
const KEYWORDS = new Set([
  "in",
  "to",
  "per",
  "x",
  "times",
  "of",
  "mod",
  "choose",
  "squared",
  "cubed",
]);

const NUMBER_PATTERN =
  /0[xX][0-9a-fA-F]+|0[bB][01]+|0[oO][0-7]+|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

const WORD_PATTERN = /[\p{L}_][\p{L}_]*/uy;

/**
 * Parse a whole line. Throws EvaluationError on malformed input.
 */
export function parseStatement(
  input: string,
  units: UnitTable,
): CalcStatement {
  const ctx: ParseContext = { input, units };
  const { node: expression, pos } = parseAdditive(ctx, 0);

  let currentPos = skipWhitespace(input, pos);
  let target: ConversionTarget | null = null;

  const word = peekWord(input, currentPos);
  if (word && (word.word === "in" || word.word === "to")) {
    const parsedTarget = parseTarget(ctx, word.end);
    target = parsedTarget.node;
    currentPos = skipWhitespace(input, parsedTarget.pos);
  }

  if (currentPos < input.length) {
    throw unexpected(ctx, currentPos);
  }
  return { expression, target };
}

function parseTarget(
  ctx: ParseContext,
  pos: number,
): Parsed<ConversionTarget> {
  const start = skipWhitespace(ctx.input, pos);
  const word = peekWord(ctx.input, start);
  if (word && skipWhitespace(ctx.input, word.end) === ctx.input.length) {
    const radix = RADIX_WORDS[word.word.toLowerCase()];
    if (radix !== undefined) {
      return { node: { type: "Radix", radix }, pos: word.end };
    }
  }

  const terms: UnitTerm[] = [];
  let sign: 1 | -1 = 1;
  let currentPos = start;

  while (true) {
    currentPos = skipWhitespace(ctx.input, currentPos);
    if (currentPos >= ctx.input.length) break;

    const c = ctx.input[currentPos];
    if (terms.length > 0 && (c === "/" || c === "*")) {
      sign = c === "/" ? -1 : 1;
      currentPos++;
      continue;
    }
    const next = peekWord(ctx.input, currentPos);
    if (terms.length > 0 && next?.word === "per") {
      sign = -1;
      currentPos = next.end;
      continue;
    }

    const reference = parseUnitReference(ctx, currentPos, true);
    if (!reference) {
      if (next) {
        throw new EvaluationError(`Unknown unit '${next.word}'`);
      }
      throw unexpected(ctx, currentPos);
    }
    terms.push({ unit: reference.node.unit, power: sign * reference.node.power });
    sign = 1;
    currentPos = reference.pos;
  }

  if (terms.length === 0 || sign === -1) {
    throw new EvaluationError("Missing unit after 'in'");
  }
  return { node: { type: "Units", units: terms }, pos: currentPos };
}

function parseAdditive(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  let { node: left, pos: currentPos } = parseMultiplicative(ctx, pos);

  while (true) {
    currentPos = skipWhitespace(ctx.input, currentPos);
    const c = ctx.input[currentPos];
    if (c === "+" || c === "-") {
      const { node: right, pos: p2 } = parseMultiplicative(
        ctx,
        currentPos + 1,
      );
      left = { type: "CalcBinary", operator: c, left, right };
      currentPos = p2;
    } else {
      break;
    }
  }

  return { node: left, pos: currentPos };
}

function parseMultiplicative(
  ctx: ParseContext,
  pos: number,
): Parsed<CalcExpr> {
  let { node: left, pos: currentPos } = parseImplicit(ctx, pos);

  while (true) {
    currentPos = skipWhitespace(ctx.input, currentPos);
    const found = readMultiplicativeOperator(ctx.input, currentPos);
    if (!found) break;

    const { node: right, pos: p2 } = parseImplicit(ctx, found.end);
    left = { type: "CalcBinary", operator: found.operator, left, right };
    currentPos = p2;
  }

  return { node: left, pos: currentPos };
}

function readMultiplicativeOperator(
  input: string,
  pos: number,
): { operator: "*" | "/" | "%" | "choose"; end: number } | null {
  const c = input[pos];
  if ((c === "*" && input[pos + 1] !== "*") || c === "×" || c === "·") {
    return { operator: "*", end: pos + 1 };
  }
  if (c === "/") {
    return { operator: "/", end: pos + 1 };
  }
  // A trailing % was already taken as percent by parsePostfix
  if (c === "%") {
    return { operator: "%", end: pos + 1 };
  }

  const word = peekWord(input, pos);
  switch (word?.word) {
    case "x":
    case "times":
    case "of":
      return { operator: "*", end: word.end };
    case "per":
      return { operator: "/", end: word.end };
    case "mod":
      return { operator: "%", end: word.end };
    case "choose":
      return { operator: "choose", end: word.end };
    default:
      return null;
  }
}

/**
 * Adjacent operands multiply: `3 feet`, `2 pi`, `4 (1 + 2)`.
 */
function parseImplicit(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  let { node: left, pos: currentPos } = parseUnary(ctx, pos);

  while (true) {
    const next = skipWhitespace(ctx.input, currentPos);
    const word = peekWord(ctx.input, next);
    const startsOperand =
      ctx.input[next] === "(" || (word !== null && !KEYWORDS.has(word.word));
    if (!startsOperand) break;

    const { node: right, pos: p2 } = parseUnary(ctx, next);
    left = { type: "CalcBinary", operator: "*", left, right };
    currentPos = p2;
  }

  return { node: left, pos: currentPos };
}

function parseUnary(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  const currentPos = skipWhitespace(ctx.input, pos);
  const c = ctx.input[currentPos];

  if (c === "-" || c === "+") {
    const { node: operand, pos: p2 } = parseUnary(ctx, currentPos + 1);
    return { node: { type: "CalcUnary", operator: c, operand }, pos: p2 };
  }

  return parsePower(ctx, currentPos);
}

function parsePower(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  const { node: base, pos: currentPos } = parsePostfix(ctx, pos);
  let p2 = skipWhitespace(ctx.input, currentPos);

  let operatorLength = 0;
  if (ctx.input[p2] === "^") {
    operatorLength = 1;
  } else if (ctx.input.slice(p2, p2 + 2) === "**") {
    operatorLength = 2;
  }

  if (operatorLength > 0) {
    p2 += operatorLength;
    // Right associative; the exponent may carry a sign: 2^-1
    const { node: exponent, pos: p3 } = parseUnary(ctx, p2);
    return {
      node: { type: "CalcBinary", operator: "^", left: base, right: exponent },
      pos: p3,
    };
  }

  return { node: base, pos: currentPos };
}

function parsePostfix(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  let { node: expr, pos: currentPos } = parsePrimary(ctx, pos);

  while (true) {
    const next = skipWhitespace(ctx.input, currentPos);
    const c = ctx.input[next];

    if (c === "!" && ctx.input[next + 1] !== "=") {
      expr = { type: "CalcPostfix", operator: "!", operand: expr };
      currentPos = next + 1;
      continue;
    }

    // `50%` is percent, `7 % 3` is modulo
    if (c === "%" && !startsOperand(ctx.input, next + 1)) {
      expr = { type: "CalcPostfix", operator: "%", operand: expr };
      currentPos = next + 1;
      continue;
    }

    const word = peekWord(ctx.input, next);
    if (word?.word === "squared" || word?.word === "cubed") {
      expr = {
        type: "CalcBinary",
        operator: "^",
        left: expr,
        right: { type: "CalcNumber", value: word.word === "squared" ? 2 : 3 },
      };
      currentPos = word.end;
      continue;
    }

    break;
  }

  return { node: expr, pos: currentPos };
}

function parsePrimary(ctx: ParseContext, pos: number): Parsed<CalcExpr> {
  const currentPos = skipWhitespace(ctx.input, pos);
  const c = ctx.input[currentPos];

  if (c === undefined) {
    throw new EvaluationError("Unexpected end of expression");
  }

  NUMBER_PATTERN.lastIndex = currentPos;
  const numberMatch = NUMBER_PATTERN.exec(ctx.input);
  if (numberMatch) {
    return {
      node: { type: "CalcNumber", value: parseNumber(numberMatch[0]) },
      pos: currentPos + numberMatch[0].length,
    };
  }

  if (c === "(") {
    const { node, pos: p2 } = parseAdditive(ctx, currentPos + 1);
    const close = skipWhitespace(ctx.input, p2);
    if (ctx.input[close] !== ")") {
      throw new EvaluationError("Missing closing parenthesis");
    }
    return { node, pos: close + 1 };
  }

  const word = peekWord(ctx.input, currentPos);
  if (!word || KEYWORDS.has(word.word)) {
    throw unexpected(ctx, currentPos);
  }

  const functionName = FUNCTION_NAMES[word.word.toLowerCase()];
  if (functionName !== undefined) {
    // sqrt(4)^2 squares the call; sqrt 4^2 takes the root of 16
    const argStart = skipWhitespace(ctx.input, word.end);
    const { node: argument, pos: p2 } =
      ctx.input[argStart] === "("
        ? parsePrimary(ctx, argStart)
        : parseUnary(ctx, argStart);
    return {
      node: { type: "CalcCall", name: functionName, argument },
      pos: p2,
    };
  }

  const constant = CONSTANTS[word.word];
  if (constant !== undefined) {
    return {
      node: { type: "CalcNumber", value: constant },
      pos: word.end,
    };
  }

  const reference = parseUnitReference(ctx, currentPos, false);
  if (reference) {
    return {
      node: {
        type: "CalcUnit",
        units: [{ unit: reference.node.unit, power: reference.node.power }],
      },
      pos: reference.pos,
    };
  }

  throw new EvaluationError(`Unknown word '${word.word}'`);
}

/**
 * A unit name, optionally led by `square`/`cubic`. In conversion targets a
 * trailing `^n`, `squared` or `cubed` belongs to the unit as well.
 */
function parseUnitReference(
  ctx: ParseContext,
  pos: number,
  inTarget: boolean,
): Parsed<{ unit: UnitDefinition; power: number }> | null {
  let currentPos = skipWhitespace(ctx.input, pos);
  let power = 1;

  const lead = peekWord(ctx.input, currentPos);
  if (lead?.word === "square" || lead?.word === "cubic") {
    const afterLead = matchUnit(ctx, skipWhitespace(ctx.input, lead.end));
    if (afterLead) {
      power = lead.word === "square" ? 2 : 3;
      currentPos = skipWhitespace(ctx.input, lead.end);
    }
  }

  const match = matchUnit(ctx, currentPos);
  if (!match) return null;
  currentPos = match.end;

  if (inTarget) {
    const next = skipWhitespace(ctx.input, currentPos);
    const exponent = /\^\s*(-?\d+)/y;
    exponent.lastIndex = next;
    const exponentMatch = exponent.exec(ctx.input);
    const word = peekWord(ctx.input, next);
    if (exponentMatch) {
      power *= Number.parseInt(exponentMatch[1], 10);
      currentPos = next + exponentMatch[0].length;
    } else if (word?.word === "squared" || word?.word === "cubed") {
      power *= word.word === "squared" ? 2 : 3;
      currentPos = word.end;
    }
  }

  if (power === 0) {
    throw new EvaluationError("Unit exponent cannot be zero");
  }
  return { node: { unit: match.unit, power }, pos: currentPos };
}

/**
 * Longest run of words (single spaces apart) that names a unit.
 */
function matchUnit(
  ctx: ParseContext,
  pos: number,
): { unit: UnitDefinition; end: number } | null {
  const words: Array<{ word: string; end: number }> = [];
  let currentPos = pos;

  while (words.length < ctx.units.maxWords) {
    const word = peekWord(ctx.input, currentPos);
    // Keywords may sit inside a name (mile per hour), never lead it
    if (!word || (words.length === 0 && KEYWORDS.has(word.word))) break;
    words.push(word);
    if (ctx.input[word.end] !== " ") break;
    currentPos = word.end + 1;
  }

  for (let count = words.length; count > 0; count--) {
    const spelling = words
      .slice(0, count)
      .map((w) => w.word)
      .join(" ");
    const unit = ctx.units.lookup(spelling);
    if (unit) {
      return { unit, end: words[count - 1].end };
    }
  }
  return null;
}

function peekWord(
  input: string,
  pos: number,
): { word: string; end: number } | null {
  WORD_PATTERN.lastIndex = pos;
  const match = WORD_PATTERN.exec(input);
  if (!match) return null;
  return { word: match[0], end: pos + match[0].length };
}

function startsOperand(input: string, pos: number): boolean {
  const next = skipWhitespace(input, pos);
  const c = input[next];
  if (c === undefined) return false;
  if (/[0-9.(]/.test(c)) return true;
  const word = peekWord(input, next);
  return word !== null && !KEYWORDS.has(word.word);
}

function parseNumber(text: string): number {
  const prefix = text.slice(0, 2).toLowerCase();
  if (prefix === "0x") return Number.parseInt(text.slice(2), 16);
  if (prefix === "0b") return Number.parseInt(text.slice(2), 2);
  if (prefix === "0o") return Number.parseInt(text.slice(2), 8);
  return Number.parseFloat(text);
}

function skipWhitespace(input: string, pos: number): number {
  while (pos < input.length && /\s/.test(input[pos])) {
    pos++;
  }
  return pos;
}

function unexpected(ctx: ParseContext, pos: number): EvaluationError {
  const word = peekWord(ctx.input, pos);
  const token = word ? word.word : ctx.input[pos];
  return new EvaluationError(`Unexpected '${token}'`);
}
