// src/server/routes.ts
import { Router } from "express";
import type { Request, Response } from "express";
import type { z } from "zod";
import type { Query } from "../filter/ast.js";
import { decodeQuery, encodeQuery } from "../filter/codec.js";
import { isQueryError } from "../filter/errors.js";
import { evaluateQuery } from "../filter/evaluate.js";
import { stringifyJson } from "../filter/json.js";
import { describeIssues } from "../filter/validate.js";
import { parseQuery } from "../parser/parser.js";
import { stringifyQuery } from "../parser/stringify.js";
import { filterCsv, formatCsv, parseCsv } from "../records/csv.js";
import { filterRecords, parseJsonLines } from "../records/jsonl.js";
import { testYamlDocument } from "../records/yaml.js";
import { cachedParse } from "../core/Cache.js";
import type { QueryCache } from "../core/Cache.js";
import { getLog } from "../utils/logger.js";
import {
  evaluateBodySchema,
  filterBodySchema,
  parseBodySchema,
  stringifyBodySchema,
  TEXT_TYPES,
  textQuerySchema,
} from "./hardening.js";

const log = getLog("QueryRoutes");

export interface RouterDeps {
  cache: QueryCache;
  maxRecords: number;
}

/** HTTP status for an error thrown while handling a query request. */
export function statusFor(e: unknown): number {
  if (!isQueryError(e)) return 500;
  switch (e.code) {
    case "PARSE_ERROR":
    case "SERIALIZATION_ERROR":
      return 400;
    case "EVALUATION_ERROR":
      return 422;
  }
}

export function buildRouter({ cache, maxRecords }: RouterDeps) {
  const r = Router();
  const FilterBody = filterBodySchema(maxRecords);

  // -------- Helpers --------
  const jsonErr = (res: Response, code: number, msg: string) =>
      res.status(code).json({ error: msg });

  // Bodies that may carry bigint values
  const sendJson = (res: Response, body: unknown) =>
      res.type("application/json").send(stringifyJson(body));

  // Text-body routes: the body must be of one of the route's media types
  const textBody = (req: Request, types: string[]): string | undefined => {
    const body: unknown = req.body;
    return req.is(types) && typeof body === "string" ? body : undefined;
  };

  const fail = (res: Response, route: string, e: unknown) => {
    const code = statusFor(e);
    const message = e instanceof Error ? e.message : String(e);
    if (code >= 500) {
      log.error("query request failed", { route }, e instanceof Error ? e : undefined);
      return jsonErr(res, code, "Internal error");
    }
    log.warn("query request rejected", { route, status: code, error: message });
    return jsonErr(res, code, message);
  };

  const validate = <T extends z.ZodTypeAny>(schema: T, input: unknown):
      { ok: true; data: z.output<T> } | { ok: false; message: string } => {
    const parsed = schema.safeParse(input);
    return parsed.success ? { ok: true, data: parsed.data } : { ok: false, message: describeIssues(parsed.error) };
  };

  const resolveQuery = (input: string | { Expression?: unknown }): Query =>
      typeof input === "string" ? cachedParse(cache, input, parseQuery) : decodeQuery(input);

  // -------- Text <-> tree --------
  r.post("/_parse", (req: Request, res: Response) => {
    const body = validate(parseBodySchema, req.body ?? {});
    if (!body.ok) return jsonErr(res, 400, body.message);
    try {
      const q = cachedParse(cache, body.data.text, parseQuery);
      return sendJson(res, { query: encodeQuery(q), canonical: stringifyQuery(q) });
    } catch (e) {
      return fail(res, "_parse", e);
    }
  });

  r.post("/_stringify", (req: Request, res: Response) => {
    const body = validate(stringifyBodySchema, req.body ?? {});
    if (!body.ok) return jsonErr(res, 400, body.message);
    try {
      return res.json({ text: stringifyQuery(decodeQuery(body.data.query)) });
    } catch (e) {
      return fail(res, "_stringify", e);
    }
  });

  // -------- Evaluation --------
  r.post("/_evaluate", (req: Request, res: Response) => {
    const body = validate(evaluateBodySchema, req.body ?? {});
    if (!body.ok) return jsonErr(res, 400, body.message);
    const { query, record, looseEquality } = body.data;
    try {
      const match = evaluateQuery(resolveQuery(query), record, { looseEquality });
      return res.json({ match });
    } catch (e) {
      return fail(res, "_evaluate", e);
    }
  });

  r.post("/_filter", (req: Request, res: Response) => {
    const body = validate(FilterBody, req.body ?? {});
    if (!body.ok) return jsonErr(res, 400, body.message);
    const { query, records, looseEquality } = body.data;
    try {
      const results = filterRecords(records, resolveQuery(query), { looseEquality });
      return sendJson(res, { results, matched: results.length, total: records.length });
    } catch (e) {
      return fail(res, "_filter", e);
    }
  });

  r.post("/_filter/jsonl", (req: Request, res: Response) => {
    const params = validate(textQuerySchema, req.query);
    if (!params.ok) return jsonErr(res, 400, params.message);
    const text = textBody(req, TEXT_TYPES.jsonl);
    if (text === undefined) return jsonErr(res, 415, "Expected an NDJSON body");
    try {
      const records = parseJsonLines(text);
      if (records.length > maxRecords) return jsonErr(res, 400, `At most ${maxRecords} records per request`);
      const results = filterRecords(records, cachedParse(cache, params.data.q, parseQuery), {
        looseEquality: params.data.looseEquality,
      });
      res.type("application/x-ndjson");
      return res.send(results.map(rec => stringifyJson(rec) + "\n").join(""));
    } catch (e) {
      return fail(res, "_filter/jsonl", e);
    }
  });

  r.post("/_filter/csv", (req: Request, res: Response) => {
    const params = validate(textQuerySchema, req.query);
    if (!params.ok) return jsonErr(res, 400, params.message);
    const text = textBody(req, TEXT_TYPES.csv);
    if (text === undefined) return jsonErr(res, 415, "Expected a CSV body");
    try {
      const table = parseCsv(text);
      if (table.rows.length > maxRecords) return jsonErr(res, 400, `At most ${maxRecords} records per request`);
      const matched = filterCsv(table, cachedParse(cache, params.data.q, parseQuery), {
        looseEquality: params.data.looseEquality,
      });
      res.type("text/csv");
      return res.send(formatCsv(matched));
    } catch (e) {
      return fail(res, "_filter/csv", e);
    }
  });

  r.post("/_test/yaml", (req: Request, res: Response) => {
    const params = validate(textQuerySchema, req.query);
    if (!params.ok) return jsonErr(res, 400, params.message);
    const text = textBody(req, TEXT_TYPES.yaml);
    if (text === undefined) return jsonErr(res, 415, "Expected a YAML body");
    try {
      const q = cachedParse(cache, params.data.q, parseQuery);
      return res.json({ match: testYamlDocument(text, q, { looseEquality: params.data.looseEquality }) });
    } catch (e) {
      return fail(res, "_test/yaml", e);
    }
  });

  return r;
}

export default buildRouter;
