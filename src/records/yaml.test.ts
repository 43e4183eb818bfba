import { describe, expect, it } from "vitest";
import { SerializationError } from "../filter/errors.js";
import { parseQuery } from "../parser/parser.js";
import { parseYamlDocuments, testYamlDocument } from "./yaml.js";

describe("parseYamlDocuments", () => {
  it("reads every document, integers as bigint", () => {
    expect(parseYamlDocuments("Name: bob\nAge: 35\n---\nTags: [go, news]\n")).toEqual([
      { Name: "bob", Age: 35n },
      { Tags: ["go", "news"] },
    ]);
  });

  it("names the broken document", () => {
    expect(() => parseYamlDocuments("a: 1\n---\nb: [1, 2\n")).toThrow(SerializationError);
    expect(() => parseYamlDocuments("a: 1\n---\nb: [1, 2\n")).toThrow(/^invalid YAML in document 2: /);
  });
});

describe("testYamlDocument", () => {
  it("evaluates the first document only", () => {
    const text = "Name: bob\nAge: 35\n---\nName: alice\n";
    expect(testYamlDocument(text, parseQuery("Name is bob and Age > 30"))).toBe(true);
    expect(testYamlDocument(text, parseQuery("Name is alice"))).toBe(false);
  });

  it("keeps large integers exact", () => {
    expect(testYamlDocument("Id: 9007199254740993\n", parseQuery("Id is 9007199254740993"))).toBe(true);
    expect(testYamlDocument("Id: 9007199254740993\n", parseQuery("Id is 9007199254740992"))).toBe(false);
  });

  it("rejects an empty stream", () => {
    expect(() => testYamlDocument("", parseQuery("a is 1"))).toThrow("YAML input has no document");
  });
});
