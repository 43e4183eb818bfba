// src/filter/json.ts
import { parse, stringify } from "lossless-json";

const INTEGER = /^-?\d+$/;

/** Integers outside the safe range read as bigint; every other number as a double. */
export function parseJsonNumber(text: string): number | bigint {
  if (!INTEGER.test(text)) return Number(text);
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : BigInt(text);
}

export function parseJson(text: string): unknown {
  return parse(text, null, parseJsonNumber);
}

/** JSON text with bigint values written as plain integer literals. */
export function stringifyJson(value: unknown): string {
  return stringify(value) ?? "null";
}
