// src/parser/parser.ts
import { and, match, not, or, order, query } from "../filter/ast.js";
import type { Expression, Query } from "../filter/ast.js";
import { ParseError } from "../filter/errors.js";
import { boolean, integer, numberValue, string } from "../filter/value.js";
import type { Value } from "../filter/value.js";
import { getLog } from "../utils/logger.js";
import { tokenize } from "./lexer.js";
import type { Token, TokenType } from "./lexer.js";

const log = getLog("QueryParser");

const INTEGER = /^-?\d+$/;
const DECIMAL = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Recursive-descent parser over the token stream. Precedence, tightest first:
 * `not`, `and`, `or`. Binary operators fold left into two-child nodes.
 */
export class Parser {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): Query {
    const q = this.parseOr();
    const tok = this.peek();
    if (tok.type !== "eof") throw new ParseError(`unexpected token ${JSON.stringify(tok.text)}`, tok.position);
    return q;
  }

  private peek(): Token {
    // tokenize always ends the stream with eof
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? { type: "eof", text: "", position: 0 };
  }

  private next(): Token {
    const tok = this.peek();
    if (tok.type !== "eof") this.pos++;
    return tok;
  }

  private accept(type: TokenType): boolean {
    if (this.peek().type !== type) return false;
    this.pos++;
    return true;
  }

  private parseOr(): Query {
    let left = this.parseAnd();
    while (this.accept("or")) {
      left = query(or(left, this.parseAnd()));
    }
    return left;
  }

  private parseAnd(): Query {
    let left = this.parseUnary();
    while (this.accept("and")) {
      left = query(and(left, this.parseUnary()));
    }
    return left;
  }

  private parseUnary(): Query {
    if (this.accept("not")) return query(not(this.parseUnary()));
    return this.parsePrimary();
  }

  private parsePrimary(): Query {
    if (this.accept("lparen")) {
      const q = this.parseOr();
      const tok = this.peek();
      if (!this.accept("rparen")) throw new ParseError("expected )", tok.position);
      return q;
    }
    return query(this.parseComparison());
  }

  private parseComparison(): Expression {
    const fieldTok = this.next();
    if (fieldTok.type !== "ident") throw new ParseError("expected identifier", fieldTok.position);

    const opTok = this.next();
    const valueTok = this.peek();
    const operand = (): Value => {
      if (valueTok.type !== "ident" && valueTok.type !== "string" && valueTok.type !== "number") {
        throw new ParseError("expected value", valueTok.position);
      }
      this.pos++;
      return tokenValue(valueTok);
    };

    switch (opTok.type) {
      case "is": return match("Is", fieldTok.text, operand());
      case "isNot": return match("IsNot", fieldTok.text, operand());
      case "contains": return match("Contains", fieldTok.text, operand());
      case "gt": return order("GT", fieldTok.text, operand());
      case "gte": return order("GTE", fieldTok.text, operand());
      case "lt": return order("LT", fieldTok.text, operand());
      case "lte": return order("LTE", fieldTok.text, operand());
      default:
        throw new ParseError(`unexpected operator ${JSON.stringify(opTok.text)}`, opTok.position);
    }
  }
}

/**
 * Quoted strings stay strings. Bare `true`/`false` are booleans, a run of
 * digits is an exact integer, other decimal literals are canonical numbers
 * and anything else is taken as text.
 */
export function tokenValue(tok: Token): Value {
  if (tok.type === "string") return string(tok.text);
  if (tok.text === "true") return boolean(true);
  if (tok.text === "false") return boolean(false);
  if (INTEGER.test(tok.text)) return integer(BigInt(tok.text));
  if (DECIMAL.test(tok.text)) return numberValue(Number(tok.text));
  return string(tok.text);
}

export function parseQuery(text: string): Query {
  const q = new Parser(tokenize(text)).parse();
  log.ok("parsed query", { length: text.length });
  return q;
}
