import { z } from "zod";
import type { MatchOp, OrderOp } from "./ast.js";

/** JSON data as parsed by parseJson: integers beyond the safe range are bigint. */
export type JsonValue = string | number | bigint | boolean | null | JsonValue[] | { [k: string]: JsonValue };

// ---------- Wire shapes ----------
export interface WireQuery {
  Expression: WireExpression | null;
}

export type WireExpression =
    | { Type: MatchOp | OrderOp; Expression: { Field: string; Value: JsonValue } }
    | { Type: "And" | "Or"; Expression: { Expressions: WireQuery[] } }
    | { Type: "Not"; Expression: { Expression: WireQuery } };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
  z.string(),
  z.number(),
  z.bigint(),
  z.boolean(),
  z.null(),
  z.array(JsonValueSchema),
  z.record(JsonValueSchema),
]));

// ---------- Two-pass decode schemas ----------
// First pass: the query wrapper, then only the discriminant.
export const QueryEnvelopeSchema = z.object({
  Expression: z.unknown(),
});

export const HeaderSchema = z.object({
  Type: z.string().min(1),
});

// Second pass: the payload for a known discriminant.
export const LeafPayloadSchema = z.object({
  Expression: z.object({
    Field: z.string().min(1).max(256),
    // a missing Value decodes as null
    Value: JsonValueSchema.optional(),
  }),
});

export const CompositePayloadSchema = z.object({
  Expression: z.object({
    Expressions: z.array(z.unknown()).max(1000).default([]),
  }),
});

export const NotPayloadSchema = z.object({
  Expression: z.object({
    Expression: z.unknown(),
  }),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
      .map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
}
