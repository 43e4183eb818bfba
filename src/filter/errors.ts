// src/filter/errors.ts

export type QueryErrorCode = "PARSE_ERROR" | "SERIALIZATION_ERROR" | "EVALUATION_ERROR";

export class QueryError extends Error {
  constructor(
      public readonly code: QueryErrorCode,
      message: string,
      options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "QueryError";
  }
}

/** Lexical or grammatical failure; `position` is the offset into the query text. */
export class ParseError extends QueryError {
  constructor(message: string, public readonly position: number) {
    super("PARSE_ERROR", `${message} at position ${position}`);
    this.name = "ParseError";
  }
}

export class SerializationError extends QueryError {
  constructor(message: string, public readonly path?: string | undefined) {
    super("SERIALIZATION_ERROR", path ? `${message} (at ${path})` : message);
    this.name = "SerializationError";
  }
}

export class EvaluationError extends QueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EVALUATION_ERROR", message, options);
    this.name = "EvaluationError";
  }
}

export function isQueryError(e: unknown): e is QueryError {
  return e instanceof QueryError;
}
