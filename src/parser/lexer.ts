// src/parser/lexer.ts
import { ParseError } from "../filter/errors.js";

export type TokenType =
    | "ident"
    | "string"
    | "number"
    | "and"
    | "or"
    | "not"
    | "is"
    | "isNot"
    | "contains"
    | "gt"
    | "gte"
    | "lt"
    | "lte"
    | "lparen"
    | "rparen"
    | "eof";

export interface Token {
  readonly type: TokenType;
  /** Source text; for strings, the contents between the quotes. */
  readonly text: string;
  /** Offset into the query text (UTF-16 code units). */
  readonly position: number;
}

// Longer spellings first: "is not" must win over "is"
const KEYWORDS: ReadonlyArray<readonly [RegExp, TokenType]> = [
  [/^and(?![\p{L}\p{Nd}_])/u, "and"],
  [/^or(?![\p{L}\p{Nd}_])/u, "or"],
  [/^not(?![\p{L}\p{Nd}_])/u, "not"],
  [/^is\s+not(?![\p{L}\p{Nd}_])/u, "isNot"],
  [/^is(?![\p{L}\p{Nd}_])/u, "is"],
  [/^contains(?![\p{L}\p{Nd}_])/u, "contains"],
];

const SYMBOLS: ReadonlyArray<readonly [string, TokenType]> = [
  [">=", "gte"],
  ["<=", "lte"],
  [">", "gt"],
  ["<", "lt"],
  ["(", "lparen"],
  [")", "rparen"],
];

export const KEYWORD_TEXT: ReadonlySet<string> = new Set(["and", "or", "not", "is", "contains"]);

const WHITESPACE = /^\s+/u;
const NUMBER = /^-?(?:\d|\.\d)[\d.]*/;
const IDENT = /^[\p{L}\p{Nd}_]+/u;

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const push = (type: TokenType, text: string, length: number) => {
    tokens.push({ type, text, position: pos });
    pos += length;
  };

  scan: while (pos < input.length) {
    const rest = input.slice(pos);

    const ws = WHITESPACE.exec(rest);
    if (ws) {
      pos += ws[0].length;
      continue;
    }

    for (const [re, type] of KEYWORDS) {
      const m = re.exec(rest);
      if (m) {
        push(type, m[0], m[0].length);
        continue scan;
      }
    }

    for (const [symbol, type] of SYMBOLS) {
      if (rest.startsWith(symbol)) {
        push(type, symbol, symbol.length);
        continue scan;
      }
    }

    if (rest.startsWith('"')) {
      const end = rest.indexOf('"', 1);
      if (end < 0) throw new ParseError("unterminated string", pos);
      push("string", rest.slice(1, end), end + 1);
      continue;
    }

    const num = NUMBER.exec(rest);
    if (num) {
      push("number", num[0], num[0].length);
      continue;
    }

    const ident = IDENT.exec(rest);
    if (ident) {
      push("ident", ident[0], ident[0].length);
      continue;
    }

    const ch = String.fromCodePoint(rest.codePointAt(0) ?? 0);
    throw new ParseError(`unexpected character ${JSON.stringify(ch)}`, pos);
  }

  tokens.push({ type: "eof", text: "", position: input.length });
  return tokens;
}
