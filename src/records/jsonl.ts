// src/records/jsonl.ts
import type { Query } from "../filter/ast.js";
import { SerializationError } from "../filter/errors.js";
import { evaluateQuery } from "../filter/evaluate.js";
import type { EvaluateOptions } from "../filter/evaluate.js";
import { parseJson } from "../filter/json.js";
import { getLog } from "../utils/logger.js";

const log = getLog("RecordFilter");

/**
 * Parse JSON Lines text. Blank lines are skipped; line numbers in errors are
 * 1-based. Integers too large for a double are read as bigint.
 */
export function parseJsonLines(text: string): unknown[] {
  const records: unknown[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") return;
    try {
      records.push(parseJson(line));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new SerializationError(`invalid JSON on line ${i + 1}: ${reason}`);
    }
  });
  return records;
}

export function filterRecords<T>(records: readonly T[], q: Query, options: EvaluateOptions = {}): T[] {
  const results = records.filter(record => evaluateQuery(q, record, options));
  log.ok("filtered records", { total: records.length, matched: results.length });
  return results;
}

export function filterJsonLines(text: string, q: Query, options: EvaluateOptions = {}): unknown[] {
  return filterRecords(parseJsonLines(text), q, options);
}

/** Single-document test. */
export function testDocument(doc: unknown, q: Query, options: EvaluateOptions = {}): boolean {
  return evaluateQuery(q, doc, options);
}
