// src/records/csv.ts
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { Query } from "../filter/ast.js";
import { SerializationError } from "../filter/errors.js";
import { evaluateQuery } from "../filter/evaluate.js";
import type { EvaluateOptions } from "../filter/evaluate.js";
import { describeIssues } from "../filter/validate.js";
import { getLog } from "../utils/logger.js";

const log = getLog("CsvFilter");

const RowsSchema = z.array(z.array(z.string()));

/** A header row naming the columns, then the data rows. Every cell is text. */
export interface CsvTable {
  header: string[];
  rows: string[][];
}

export function parseCsv(text: string): CsvTable {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (e) {
    throw new SerializationError(`invalid CSV: ${e instanceof Error ? e.message : String(e)}`);
  }
  const rows = RowsSchema.safeParse(parsed);
  if (!rows.success) throw new SerializationError(`invalid CSV: ${describeIssues(rows.error)}`);
  const [header, ...body] = rows.data;
  if (!header) throw new SerializationError("CSV input has no header row");
  return { header, rows: body };
}

/**
 * The record a row is evaluated as, keyed by column name. A short row leaves
 * its trailing columns absent; with repeated column names the last one wins.
 */
export function csvRecord(header: readonly string[], row: readonly string[]): Map<string, string> {
  const record = new Map<string, string>();
  header.forEach((name, i) => {
    const cell = row[i];
    if (cell !== undefined) record.set(name, cell);
  });
  return record;
}

/** Keep the rows matching `q`; the header is kept as is. */
export function filterCsv(table: CsvTable, q: Query, options: EvaluateOptions = {}): CsvTable {
  const rows = table.rows.filter(row => evaluateQuery(q, csvRecord(table.header, row), options));
  log.ok("filtered CSV rows", { total: table.rows.length, matched: rows.length });
  return { header: table.header, rows };
}

export function formatCsv(table: CsvTable): string {
  return stringify([table.header, ...table.rows]);
}
