// src/aliases.ts
// Short names for the expression builders, for densely written queries.
import { and, contains, gt, gte, is, isNot, lt, lte, not, or, query } from "./filter/ast.js";
import type { Expression } from "./filter/ast.js";

export type Expr = Expression;

export {
  query as Q,
  is as EQ,
  isNot as NE,
  gt as GT,
  gte as GTE,
  lt as LT,
  lte as LTE,
  contains as CT,
  and as AND,
  or as OR,
  not as NOT,
};
