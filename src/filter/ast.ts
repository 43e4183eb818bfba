import { literal, textOf } from "./value.js";
import type { Literal, Value } from "./value.js";

export type MatchOp = "Is" | "IsNot" | "Contains" | "IContains";
export type OrderOp = "GT" | "GTE" | "LT" | "LTE";
export type CompareOp = "eq" | "neq" | "gt" | "gte" | "lt" | "lte" | "contains" | "icontains";

/** A value-producing callable available to Call terms. */
export type EvaluatorFunction = (...args: Value[]) => Value;

export type Term =
    | { readonly type: "Field"; readonly name: string }
    | { readonly type: "Constant"; readonly value: Value }
    | { readonly type: "Self" }
    | { readonly type: "Variable"; readonly name: string }
    | {
    readonly type: "Call";
    readonly name?: string | undefined;
    readonly fn?: EvaluatorFunction | undefined;
    readonly args: readonly Term[];
}
    | { readonly type: "If"; readonly condition: Term; readonly then: Term; readonly else?: Term | undefined }
    | { readonly type: "Bool"; readonly term: Term };

export type Expression =
    | { readonly type: MatchOp; readonly field: string; readonly value: Value }
    | {
    readonly type: OrderOp;
    readonly field: string;
    readonly value: Value;
    // textual form of `value`, for comparisons against string fields
    readonly operandText: string;
}
    | { readonly type: "And" | "Or"; readonly queries: readonly Query[] }
    | { readonly type: "Not"; readonly query: Query }
    | { readonly type: "Compare"; readonly op: CompareOp; readonly lhs: Term; readonly rhs: Term };

export type ExpressionType = Expression["type"];

/** Owns at most one expression; an empty query never matches. */
export interface Query {
  readonly expression: Expression | null;
}

type QueryLike = Query | Expression;

const freeze = <T extends object>(node: T): T => Object.freeze(node);

const toQuery = (q: QueryLike): Query => ("expression" in q ? q : query(q));

// ---------- Query builders ----------
export const query = (expression: Expression | null = null): Query => freeze<Query>({ expression });
export const empty = (): Query => query(null);

export const is = (field: string, value: Literal): Expression =>
    freeze<Expression>({ type: "Is", field, value: literal(value) });
export const isNot = (field: string, value: Literal): Expression =>
    freeze<Expression>({ type: "IsNot", field, value: literal(value) });
export const contains = (field: string, value: Literal): Expression =>
    freeze<Expression>({ type: "Contains", field, value: literal(value) });
export const icontains = (field: string, value: Literal): Expression =>
    freeze<Expression>({ type: "IContains", field, value: literal(value) });

export const order = (type: OrderOp, field: string, value: Literal): Expression => {
  const v = literal(value);
  return freeze<Expression>({ type, field, value: v, operandText: textOf(v) });
};
export const gt = (field: string, value: Literal) => order("GT", field, value);
export const gte = (field: string, value: Literal) => order("GTE", field, value);
export const lt = (field: string, value: Literal) => order("LT", field, value);
export const lte = (field: string, value: Literal) => order("LTE", field, value);

export const match = (type: MatchOp, field: string, value: Literal): Expression =>
    freeze<Expression>({ type, field, value: literal(value) });

export const and = (...children: QueryLike[]): Expression =>
    freeze<Expression>({ type: "And", queries: freeze(children.map(toQuery)) });
export const or = (...children: QueryLike[]): Expression =>
    freeze<Expression>({ type: "Or", queries: freeze(children.map(toQuery)) });
export const not = (child: QueryLike): Expression =>
    freeze<Expression>({ type: "Not", query: toQuery(child) });
export const compare = (op: CompareOp, lhs: Term, rhs: Term): Expression =>
    freeze<Expression>({ type: "Compare", op, lhs, rhs });

// ---------- Term builders ----------
export const field = (name: string): Term => freeze<Term>({ type: "Field", name });
export const constant = (value: Literal): Term => freeze<Term>({ type: "Constant", value: literal(value) });
export const self = (): Term => freeze<Term>({ type: "Self" });
export const variable = (name: string): Term => freeze<Term>({ type: "Variable", name });
export const call = (nameOrFn: string | EvaluatorFunction, ...args: Term[]): Term =>
    typeof nameOrFn === "string"
        ? freeze<Term>({ type: "Call", name: nameOrFn, args: freeze(args) })
        : freeze<Term>({ type: "Call", fn: nameOrFn, args: freeze(args) });
/** Named call that falls back to `fn` when the context has no function of that name. */
export const callWithFallback = (name: string, fn: EvaluatorFunction, ...args: Term[]): Term =>
    freeze<Term>({ type: "Call", name, fn, args: freeze(args) });
export const when = (condition: Term, then: Term, otherwise?: Term): Term =>
    otherwise === undefined
        ? freeze<Term>({ type: "If", condition, then })
        : freeze<Term>({ type: "If", condition, then, else: otherwise });
export const bool = (term: Term): Term => freeze<Term>({ type: "Bool", term });
