// src/filter/codec.ts
import type { z } from "zod";
import { and, match, not, or, order, query } from "./ast.js";
import type { Expression, Query } from "./ast.js";
import { SerializationError } from "./errors.js";
import { parseJson, stringifyJson } from "./json.js";
import {
  CompositePayloadSchema,
  HeaderSchema,
  LeafPayloadSchema,
  NotPayloadSchema,
  QueryEnvelopeSchema,
  describeIssues,
} from "./validate.js";
import type { JsonValue, WireExpression, WireQuery } from "./validate.js";
import { NULL, boolean, integer, list, map, nativeInteger, numberValue, string } from "./value.js";
import type { Value } from "./value.js";

const MAX_DEPTH = 256;

// ---------- Values ----------
export function valueToJson(v: Value, path = "$"): JsonValue {
  switch (v.kind) {
    case "integer":
    case "unsigned":
      return nativeInteger(v.value);
    case "float":
      if (!Number.isFinite(v.value)) throw new SerializationError(`non-finite number ${v.value} has no JSON form`, path);
      return v.value;
    case "string":
    case "boolean":
      return v.value;
    case "null":
      return null;
    case "list":
      return v.items.map((item, i) => valueToJson(item, `${path}[${i}]`));
    case "map":
      return Object.fromEntries(Array.from(v.entries, ([k, item]) => [k, valueToJson(item, `${path}.${k}`)] as const));
  }
}

/**
 * JSON numbers decode canonically: safe integers as integer, the rest as
 * float. A bigint (an integer too large for a double) stays an exact integer.
 */
export function valueFromJson(j: JsonValue): Value {
  if (j === null) return NULL;
  if (Array.isArray(j)) return list(j.map(valueFromJson));
  switch (typeof j) {
    case "number": return numberValue(j);
    case "bigint": return integer(j);
    case "string": return string(j);
    case "boolean": return boolean(j);
    default: return map(Object.entries(j).map(([k, item]) => [k, valueFromJson(item)] as const));
  }
}

// ---------- Encode ----------
export function encodeQuery(q: Query): WireQuery {
  return { Expression: q.expression ? encodeExpression(q.expression, "$.Expression") : null };
}

function encodeExpression(e: Expression, path: string): WireExpression {
  switch (e.type) {
    case "Is":
    case "IsNot":
    case "Contains":
    case "IContains":
    case "GT":
    case "GTE":
    case "LT":
    case "LTE":
      return { Type: e.type, Expression: { Field: e.field, Value: valueToJson(e.value, `${path}.Value`) } };
    case "And":
    case "Or":
      return {
        Type: e.type,
        Expression: {
          Expressions: e.queries.map((q, i) => ({
            Expression: q.expression ? encodeExpression(q.expression, `${path}.Expressions[${i}]`) : null,
          })),
        },
      };
    case "Not":
      return {
        Type: "Not",
        Expression: {
          Expression: { Expression: e.query.expression ? encodeExpression(e.query.expression, `${path}.Expression`) : null },
        },
      };
    case "Compare":
      throw new SerializationError("Compare expressions have no wire form", path);
  }
}

export function serializeQuery(q: Query): string {
  return stringifyJson(encodeQuery(q));
}

// ---------- Decode ----------
function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string, path: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new SerializationError(`malformed ${what}: ${describeIssues(parsed.error)}`, path);
  return parsed.data;
}

/**
 * Decode a wire query. The discriminant is read first; the payload is then
 * validated against the shape for that discriminant.
 */
export function decodeQuery(input: unknown): Query {
  return decodeAt(input, "$", 0);
}

function decodeAt(input: unknown, path: string, depth: number): Query {
  if (depth > MAX_DEPTH) throw new SerializationError(`query nesting exceeds ${MAX_DEPTH} levels`, path);
  const envelope = parseWith(QueryEnvelopeSchema, input, "query", path);
  const raw = envelope.Expression;
  if (raw === null || raw === undefined) return query(null);
  return query(decodeExpression(raw, `${path}.Expression`, depth));
}

function decodeExpression(raw: unknown, path: string, depth: number): Expression {
  const { Type } = parseWith(HeaderSchema, raw, "expression header", path);
  switch (Type) {
    case "Is":
    case "IsNot":
    case "Contains":
    case "IContains": {
      const p = parseWith(LeafPayloadSchema, raw, `${Type} payload`, path).Expression;
      return match(Type, p.Field, valueFromJson(p.Value ?? null));
    }
    case "GT":
    case "GTE":
    case "LT":
    case "LTE": {
      const p = parseWith(LeafPayloadSchema, raw, `${Type} payload`, path).Expression;
      return order(Type, p.Field, valueFromJson(p.Value ?? null));
    }
    case "And":
    case "Or": {
      const p = parseWith(CompositePayloadSchema, raw, `${Type} payload`, path).Expression;
      const children = p.Expressions.map((child, i) => decodeAt(child, `${path}.Expressions[${i}]`, depth + 1));
      return Type === "And" ? and(...children) : or(...children);
    }
    case "Not": {
      const p = parseWith(NotPayloadSchema, raw, "Not payload", path).Expression;
      return not(decodeAt(p.Expression, `${path}.Expression`, depth + 1));
    }
    default:
      throw new SerializationError(`unrecognized expression type ${JSON.stringify(Type)}`, path);
  }
}

export function deserializeQuery(text: string): Query {
  let parsed: unknown;
  try {
    parsed = parseJson(text);
  } catch (e) {
    throw new SerializationError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return decodeQuery(parsed);
}
