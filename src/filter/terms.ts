// src/filter/terms.ts
import type { EvaluatorFunction, Term } from "./ast.js";
import { EvaluationError } from "./errors.js";
import { resolveRecord } from "./record.js";
import { NULL, boolean, toValue } from "./value.js";
import type { Value } from "./value.js";

/**
 * Caller-owned functions and variables consulted by Call and Variable terms.
 * The evaluator only reads from it.
 */
export interface Context {
  readonly functions: ReadonlyMap<string, EvaluatorFunction>;
  readonly variables: ReadonlyMap<string, Value>;
}

export interface ContextInit {
  functions?: Record<string, EvaluatorFunction> | undefined;
  /** Native values; projected with toValue. */
  variables?: Record<string, unknown> | undefined;
}

export function createContext(init: ContextInit = {}): Context {
  return {
    functions: new Map(Object.entries(init.functions ?? {})),
    variables: new Map(Object.entries(init.variables ?? {}).map(([k, v]) => [k, toValue(v)] as const)),
  };
}

const EMPTY_CONTEXT: Context = createContext();

// Accepted spellings of a boolean literal
const TRUE_TOKENS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_TOKENS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/**
 * Truthiness used by Bool and If terms. Strings must spell a boolean;
 * anything else is an EvaluationError rather than false.
 */
export function isTruthy(v: Value): boolean {
  switch (v.kind) {
    case "null": return false;
    case "boolean": return v.value;
    case "integer":
    case "unsigned": return v.value !== 0n;
    case "float": return v.value !== 0;
    case "string":
      if (TRUE_TOKENS.has(v.value)) return true;
      if (FALSE_TOKENS.has(v.value)) return false;
      throw new EvaluationError(`cannot interpret ${JSON.stringify(v.value)} as a boolean`);
    case "list": return v.items.length > 0;
    case "map": return v.entries.size > 0;
  }
}

export function evaluateTerm(term: Term, input: unknown, context: Context = EMPTY_CONTEXT): Value {
  switch (term.type) {
    case "Field": {
      const record = resolveRecord(input);
      if (!record) throw new EvaluationError(`cannot resolve field ${term.name}: input is not a record`);
      const found = record.lookup(term.name);
      if (!found.found) throw new EvaluationError(`field ${term.name} not found`);
      return found.value;
    }
    case "Constant":
      return term.value;
    case "Self":
      return toValue(input);
    case "Variable": {
      const v = context.variables.get(term.name);
      if (v === undefined) throw new EvaluationError(`variable ${JSON.stringify(term.name)} not defined`);
      return v;
    }
    case "Call":
      return callFunction(term, input, context);
    case "If": {
      if (isTruthy(evaluateTerm(term.condition, input, context))) {
        return evaluateTerm(term.then, input, context);
      }
      return term.else ? evaluateTerm(term.else, input, context) : NULL;
    }
    case "Bool":
      return boolean(isTruthy(evaluateTerm(term.term, input, context)));
  }
}

function callFunction(term: Extract<Term, { type: "Call" }>, input: unknown, context: Context): Value {
  const named = term.name !== undefined ? context.functions.get(term.name) : undefined;
  const fn = named ?? term.fn;
  const label = term.name ?? (fn?.name || "anonymous");
  if (!fn) throw new EvaluationError(`function ${JSON.stringify(label)} not found`);

  // Arguments are evaluated left to right; the first failure aborts the call
  const args = term.args.map(arg => evaluateTerm(arg, input, context));
  try {
    return fn(...args);
  } catch (e) {
    if (e instanceof EvaluationError) throw e;
    const reason = e instanceof Error ? e.message : String(e);
    throw new EvaluationError(`function ${JSON.stringify(label)} failed: ${reason}`, { cause: e });
  }
}
