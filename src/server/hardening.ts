import helmet from "helmet";
import rateLimit from "express-rate-limit";
import cors from "cors";
import express from "express";
import { z } from "zod";
import type { RequestHandler } from "express";
import { SerializationError } from "../filter/errors.js";
import { parseJson } from "../filter/json.js";
import { JsonValueSchema } from "../filter/validate.js";

export const securityMiddleware = (perMinute = 300): RequestHandler[] => [
  helmet({ contentSecurityPolicy: false, crossOriginResourcePolicy: { policy: "same-site" } }),
  cors({ origin: false }),
  rateLimit({ windowMs: 60_000, limit: perMinute, standardHeaders: true, legacyHeaders: false }),
];

export const TEXT_TYPES = {
  jsonl: ["application/x-ndjson", "application/jsonl"],
  csv: ["text/csv"],
  yaml: ["application/yaml", "application/x-yaml", "text/yaml"],
};

// JSON is read as text and parsed here so large integers arrive as bigint
const jsonBody: RequestHandler = (req, _res, next) => {
  if (!req.is("application/json") || typeof req.body !== "string") return next();
  const text: string = req.body;
  try {
    req.body = text.trim() === "" ? {} : parseJson(text);
  } catch (e) {
    return next(new SerializationError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`));
  }
  return next();
};

export const bodyLimit = (size = "512kb"): RequestHandler[] => [
  express.text({ limit: size, type: "application/json" }),
  jsonBody,
  express.text({ limit: size, type: [...TEXT_TYPES.jsonl, ...TEXT_TYPES.csv, ...TEXT_TYPES.yaml, "text/plain"] }),
];

// -------- Request bodies --------
const queryText = z.string().min(1).max(20_000);

export const wireQuerySchema = z.object({ Expression: z.unknown() });

/** A query given either as text or in wire form. */
export const queryInputSchema = z.union([queryText, wireQuerySchema]);

export const parseBodySchema = z.object({ text: queryText });

export const stringifyBodySchema = z.object({ query: wireQuerySchema });

export const evaluateBodySchema = z.object({
  query: queryInputSchema,
  record: JsonValueSchema,
  looseEquality: z.boolean().optional(),
});

export const filterBodySchema = (maxRecords: number) =>
  z.object({
    query: queryInputSchema,
    records: z.array(JsonValueSchema).max(maxRecords),
    looseEquality: z.boolean().optional(),
  });

/** Query-string parameters of the text-body routes. */
export const textQuerySchema = z.object({
  q: queryText,
  looseEquality: z.enum(["true", "false"]).transform(v => v === "true").optional(),
});
