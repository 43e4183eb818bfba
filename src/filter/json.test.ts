import { describe, expect, it } from "vitest";
import { parseJson, parseJsonNumber, stringifyJson } from "./json.js";

describe("JSON numbers", () => {
  it("reads unsafe integers as bigint and everything else as number", () => {
    expect(parseJsonNumber("42")).toBe(42);
    expect(parseJsonNumber("9007199254740991")).toBe(9007199254740991);
    expect(parseJsonNumber("9007199254740993")).toBe(9007199254740993n);
    expect(parseJsonNumber("1e21")).toBe(1e21);
    expect(parseJsonNumber("2.5")).toBe(2.5);
  });

  it("writes bigints back unchanged", () => {
    const text = '{"big":-9007199254740993,"small":[1,2.5]}';
    expect(parseJson(text)).toEqual({ big: -9007199254740993n, small: [1, 2.5] });
    expect(stringifyJson(parseJson(text))).toBe(text);
  });
});
