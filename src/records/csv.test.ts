import { describe, expect, it } from "vitest";
import { SerializationError } from "../filter/errors.js";
import { parseQuery } from "../parser/parser.js";
import { csvRecord, filterCsv, formatCsv, parseCsv } from "./csv.js";

const people = "Name,Age,City\nalice,35,Paris\nbob,4,Oslo\ncarol,20,Rome\n";

describe("parseCsv", () => {
  it("splits the header from the rows", () => {
    expect(parseCsv(people)).toEqual({
      header: ["Name", "Age", "City"],
      rows: [["alice", "35", "Paris"], ["bob", "4", "Oslo"], ["carol", "20", "Rome"]],
    });
  });

  it("handles quoted cells and blank lines", () => {
    expect(parseCsv('a,b\n\n"x, y","say ""hi"""\n')).toEqual({ header: ["a", "b"], rows: [["x, y", 'say "hi"']] });
  });

  it("rejects empty input and broken quoting", () => {
    expect(() => parseCsv("")).toThrow("CSV input has no header row");
    expect(() => parseCsv('a,b\n"open,1\n')).toThrow(SerializationError);
    expect(() => parseCsv('a,b\n"open,1\n')).toThrow(/^invalid CSV: /);
  });
});

describe("csvRecord", () => {
  it("keys cells by column and leaves missing cells absent", () => {
    expect(csvRecord(["a", "b", "c"], ["1", "2"])).toEqual(new Map([["a", "1"], ["b", "2"]]));
  });
});

describe("filterCsv", () => {
  it("keeps matching rows under the original header", () => {
    const out = filterCsv(parseCsv(people), parseQuery('City is "Oslo" or Name is alice'));
    expect(formatCsv(out)).toBe("Name,Age,City\nalice,35,Paris\nbob,4,Oslo\n");
  });

  it("compares columns as text", () => {
    // "4" sorts after "30" byte-wise
    const out = filterCsv(parseCsv(people), parseQuery("Age > 30"));
    expect(out.rows.map(row => row[0])).toEqual(["alice", "bob"]);
  });

  it("matches numbers against cells only with looseEquality", () => {
    const table = parseCsv(people);
    const q = parseQuery("Age is 35");
    expect(filterCsv(table, q).rows).toEqual([]);
    expect(filterCsv(table, q, { looseEquality: true }).rows).toEqual([["alice", "35", "Paris"]]);
  });

  it("treats a short row's missing column as absent", () => {
    const table = parseCsv("a,b\n1\n2,x\n");
    expect(filterCsv(table, parseQuery("b is not x")).rows).toEqual([]);
  });
});

describe("formatCsv", () => {
  it("quotes cells that need it", () => {
    expect(formatCsv({ header: ["a"], rows: [["x, y"], ['say "hi"']] })).toBe('a\n"x, y"\n"say ""hi"""\n');
  });
});
