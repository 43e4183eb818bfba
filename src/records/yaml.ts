// src/records/yaml.ts
import { parseAllDocuments } from "yaml";
import type { Query } from "../filter/ast.js";
import { SerializationError } from "../filter/errors.js";
import { evaluateQuery } from "../filter/evaluate.js";
import type { EvaluateOptions } from "../filter/evaluate.js";

/**
 * Parse every document of a YAML stream into plain data. Integers are read
 * as bigint so they project exactly.
 */
export function parseYamlDocuments(text: string): unknown[] {
  return Array.from(parseAllDocuments(text, { intAsBigInt: true }), (doc, i) => {
    const [first] = doc.errors;
    if (first) throw new SerializationError(`invalid YAML in document ${i + 1}: ${first.message}`);
    const data: unknown = doc.toJS();
    return data;
  });
}

/** Evaluate `q` against the first document of a YAML stream. */
export function testYamlDocument(text: string, q: Query, options: EvaluateOptions = {}): boolean {
  const [doc] = parseYamlDocuments(text);
  if (doc === undefined) throw new SerializationError("YAML input has no document");
  return evaluateQuery(q, doc, options);
}
