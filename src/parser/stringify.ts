// src/parser/stringify.ts
import type { Expression, MatchOp, OrderOp, Query } from "../filter/ast.js";
import { SerializationError } from "../filter/errors.js";
import type { Value } from "../filter/value.js";
import { KEYWORD_TEXT } from "./lexer.js";

const OPERATORS: Record<MatchOp | OrderOp, string | undefined> = {
  Is: "is",
  IsNot: "is not",
  Contains: "contains",
  GT: ">",
  GTE: ">=",
  LT: "<",
  LTE: "<=",
  // no textual operator
  IContains: undefined,
};

/**
 * Canonical text for a query: composites are parenthesised, leaves read
 * `field op value`. An empty query renders as the empty string.
 */
export function stringifyQuery(q: Query): string {
  return q.expression ? stringifyExpression(q.expression) : "";
}

function stringifyChild(q: Query, path: string): string {
  if (!q.expression) throw new SerializationError("empty query has no textual form", path);
  return stringifyExpression(q.expression, path);
}

export function stringifyExpression(e: Expression, path = "$"): string {
  switch (e.type) {
    case "And":
    case "Or": {
      if (e.queries.length === 0) throw new SerializationError(`empty ${e.type} has no textual form`, path);
      const joiner = e.type === "And" ? " and " : " or ";
      return `(${e.queries.map((q, i) => stringifyChild(q, `${path}.Expressions[${i}]`)).join(joiner)})`;
    }
    case "Not":
      return `not ${stringifyChild(e.query, `${path}.Expression`)}`;
    case "Compare":
      throw new SerializationError("Compare expressions have no textual form", path);
    default: {
      const op = OPERATORS[e.type];
      if (op === undefined) throw new SerializationError(`${e.type} has no textual operator`, path);
      return `${fieldText(e.field, path)} ${op} ${valueText(e.value, path)}`;
    }
  }
}

// A field must lex back as a single identifier: no keyword, no leading digit
const IDENTIFIER = /^[\p{L}_][\p{L}\p{Nd}_]*$/u;

function fieldText(name: string, path: string): string {
  if (!IDENTIFIER.test(name) || KEYWORD_TEXT.has(name)) {
    throw new SerializationError(`field name ${JSON.stringify(name)} is not an identifier`, path);
  }
  return name;
}

function valueText(v: Value, path: string): string {
  switch (v.kind) {
    case "string":
      if (v.value.includes('"')) throw new SerializationError("string value containing '\"' has no textual form", path);
      return `"${v.value}"`;
    case "boolean":
      return v.value ? "true" : "false";
    case "integer":
    case "unsigned":
      return v.value.toString();
    case "float":
      return floatText(v.value, path);
    default:
      throw new SerializationError(`${v.kind} value has no textual form`, path);
  }
}

const EXPONENT = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Plain decimal digits for a double, expanding exponent notation. An integral
 * value beyond the safe range keeps a `.0` so it reads back as a float.
 */
function floatText(n: number, path: string): string {
  if (!Number.isFinite(n)) throw new SerializationError(`number ${n} has no textual form`, path);
  let text = n.toString();
  const m = EXPONENT.exec(text);
  if (m) {
    const [, sign = "", whole = "", fraction = "", exponent = "0"] = m;
    const digits = whole + fraction;
    const point = whole.length + Number(exponent);
    if (point <= 0) text = `${sign}0.${"0".repeat(-point)}${digits}`;
    else if (point >= digits.length) text = sign + digits + "0".repeat(point - digits.length);
    else text = `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return Number.isInteger(n) && !Number.isSafeInteger(n) ? `${text}.0` : text;
}
