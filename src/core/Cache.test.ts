import { describe, expect, it, vi } from "vitest";
import { empty } from "../filter/ast.js";
import { ParseError } from "../filter/errors.js";
import { parseQuery } from "../parser/parser.js";
import { cachedParse, makeQueryCache } from "./Cache.js";

describe("cachedParse", () => {
  it("parses each text once", () => {
    const cache = makeQueryCache({ max: 10 });
    const parse = vi.fn(parseQuery);
    const first = cachedParse(cache, "a is 1", parse);
    const second = cachedParse(cache, "a is 1", parse);
    expect(second).toBe(first);
    expect(parse).toHaveBeenCalledTimes(1);
  });

  it("does not cache failures", () => {
    const cache = makeQueryCache();
    const parse = vi.fn(parseQuery);
    expect(() => cachedParse(cache, "a is", parse)).toThrow(ParseError);
    expect(() => cachedParse(cache, "a is", parse)).toThrow(ParseError);
    expect(parse).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entry", () => {
    const cache = makeQueryCache({ max: 2 });
    const parse = vi.fn(() => empty());
    cachedParse(cache, "one", parse);
    cachedParse(cache, "two", parse);
    cachedParse(cache, "one", parse);
    cachedParse(cache, "three", parse);
    expect(cache.has("one")).toBe(true);
    expect(cache.has("two")).toBe(false);
  });
});
