// src/filter/evaluate.ts
import type { CompareOp, Expression, Query } from "./ast.js";
import { lookupField } from "./record.js";
import { evaluateTerm } from "./terms.js";
import type { Context } from "./terms.js";
import {
  coerceLike,
  coerceNumber,
  compareNumbers,
  compareText,
  isEmptyish,
  isNumeric,
  textOf,
  valuesEqual,
} from "./value.js";
import type { Value } from "./value.js";

export interface EvaluateOptions {
  context?: Context | undefined;
  /**
   * When structural equality fails, let Is/IsNot compare textual forms, so a
   * field holding "5" matches the operand 5. Off by default.
   */
  looseEquality?: boolean | undefined;
}

/**
 * Evaluate a query against a record. Absent fields, failed coercions and kind
 * mismatches are plain `false`; only Term evaluation throws (EvaluationError).
 */
export function evaluateQuery(q: Query, input: unknown, options: EvaluateOptions = {}): boolean {
  return q.expression ? evaluateExpression(q.expression, input, options) : false;
}

export function evaluateExpression(e: Expression, input: unknown, options: EvaluateOptions = {}): boolean {
  switch (e.type) {
    case "And":
      for (const child of e.queries) {
        if (!evaluateQuery(child, input, options)) return false;
      }
      return true;
    case "Or":
      for (const child of e.queries) {
        if (evaluateQuery(child, input, options)) return true;
      }
      return false;
    case "Not":
      return !evaluateQuery(e.query, input, options);
    case "Compare":
      return evaluateCompare(e.op, evaluateTerm(e.lhs, input, options.context), evaluateTerm(e.rhs, input, options.context));
  }

  const found = lookupField(input, e.field);
  if (!found.found) return false;
  const f = found.value;

  switch (e.type) {
    case "Is":
      return matches(f, e.value, options);
    case "IsNot":
      return !matches(f, e.value, options);
    case "Contains":
      if (e.value.kind === "null") return false;
      if (f.kind === "list") return f.items.some(item => valuesEqual(item, e.value));
      if (f.kind === "string") return f.value.includes(textOf(e.value));
      return false;
    case "IContains":
      return f.kind === "string" && f.value.toLowerCase().includes(textOf(e.value).toLowerCase());
    case "GT":
      return ordered(f, e.value, e.operandText, c => c > 0);
    case "GTE":
      return ordered(f, e.value, e.operandText, c => c >= 0);
    case "LT":
      return ordered(f, e.value, e.operandText, c => c < 0);
    case "LTE":
      return ordered(f, e.value, e.operandText, c => c <= 0);
  }
}

function matches(f: Value, v: Value, options: EvaluateOptions): boolean {
  if (v.kind === "null" && isEmptyish(f)) return true;
  if (valuesEqual(f, v)) return true;
  return options.looseEquality === true && textOf(f) === textOf(v);
}

function ordered(f: Value, v: Value, operandText: string, test: (c: number) => boolean): boolean {
  if (isNumeric(f)) {
    const n = coerceLike(f, v);
    const c = n === undefined ? undefined : compareNumbers(f.value, n);
    return c !== undefined && test(c);
  }
  if (f.kind === "string") {
    return test(compareText(f.value, v.kind === "string" ? v.value : operandText));
  }
  return false;
}

function evaluateCompare(op: CompareOp, lhs: Value, rhs: Value): boolean {
  switch (op) {
    case "contains":
      return textOf(lhs).includes(textOf(rhs));
    case "icontains":
      return textOf(lhs).toLowerCase().includes(textOf(rhs).toLowerCase());
  }

  const a = coerceNumber(lhs);
  const b = coerceNumber(rhs);
  const c = a !== undefined && b !== undefined ? compareNumbers(a, b) : compareText(textOf(lhs), textOf(rhs));
  // NaN is unordered and unequal to everything
  if (c === undefined) return op === "neq";
  switch (op) {
    case "eq": return c === 0;
    case "neq": return c !== 0;
    case "gt": return c > 0;
    case "gte": return c >= 0;
    case "lt": return c < 0;
    case "lte": return c <= 0;
  }
}
