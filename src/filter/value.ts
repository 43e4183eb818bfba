// src/filter/value.ts
import { getLog } from "../utils/logger.js";
import { stringifyJson } from "./json.js";

const log = getLog("ValueProjection");

// ---------- Value union ----------
export type IntegerValue = { readonly kind: "integer"; readonly value: bigint };
export type UnsignedValue = { readonly kind: "unsigned"; readonly value: bigint };
export type FloatValue = { readonly kind: "float"; readonly value: number };
export type StringValue = { readonly kind: "string"; readonly value: string };
export type BooleanValue = { readonly kind: "boolean"; readonly value: boolean };
export type NullValue = { readonly kind: "null" };
export type ListValue = { readonly kind: "list"; readonly items: readonly Value[] };
export type MapValue = { readonly kind: "map"; readonly entries: ReadonlyMap<string, Value> };

export type NumericValue = IntegerValue | UnsignedValue | FloatValue;

export type Value =
    | NumericValue
    | StringValue
    | BooleanValue
    | NullValue
    | ListValue
    | MapValue;

export type ValueKind = Value["kind"];

/** What builders accept where a literal operand is expected. */
export type Literal = Value | string | number | bigint | boolean | null;

// ---------- Constructors ----------
export const NULL: NullValue = Object.freeze({ kind: "null" });

const toBigInt = (value: bigint | number): bigint =>
    typeof value === "bigint" ? value : BigInt(Math.trunc(value));

/** Numbers are truncated; a non-finite number is a RangeError. */
export const integer = (value: bigint | number): IntegerValue => ({ kind: "integer", value: toBigInt(value) });
export const unsigned = (value: bigint | number): UnsignedValue => {
  const n = toBigInt(value);
  if (n < 0n) throw new RangeError(`Unsigned value cannot be negative: ${value}`);
  return { kind: "unsigned", value: n };
};
export const float = (value: number): FloatValue => ({ kind: "float", value });
export const string = (value: string): StringValue => ({ kind: "string", value });
export const boolean = (value: boolean): BooleanValue => ({ kind: "boolean", value });
export const list = (items: readonly Value[]): ListValue => ({ kind: "list", items });
export const map = (entries: Iterable<readonly [string, Value]>): MapValue => ({ kind: "map", entries: new Map(entries) });

/**
 * Canonical number: integer when `n` is a safe integer, float otherwise.
 * Decimal literals and JSON numbers that fit a double are read this way.
 */
export function numberValue(n: number): IntegerValue | FloatValue {
  return Number.isSafeInteger(n) ? integer(n) : float(n);
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** A plain number when it is exact, the bigint otherwise. */
export function nativeInteger(n: bigint): number | bigint {
  return n >= -MAX_SAFE && n <= MAX_SAFE ? Number(n) : n;
}

export function literal(v: Literal): Value {
  if (v === null) return NULL;
  switch (typeof v) {
    case "string": return string(v);
    case "number": return numberValue(v);
    case "bigint": return integer(v);
    case "boolean": return boolean(v);
    default: return v;
  }
}

export function isNumeric(v: Value): v is NumericValue {
  return v.kind === "integer" || v.kind === "unsigned" || v.kind === "float";
}

// ---------- Projection from native data ----------

/**
 * Snapshot an arbitrary JS value as a Value. Plain JS numbers are doubles and
 * become floats; bigints become integers. Cyclic back-references become null.
 */
export function toValue(native: unknown): Value {
  return project(native, new Set<object>());
}

function project(native: unknown, ancestors: Set<object>): Value {
  switch (typeof native) {
    case "undefined": return NULL;
    case "string": return string(native);
    case "number": return float(native);
    case "bigint": return integer(native);
    case "boolean": return boolean(native);
    case "function":
    case "symbol": return NULL;
  }
  if (native === null || typeof native !== "object") return NULL;
  if (native instanceof Number) return float(native.valueOf());
  if (native instanceof String) return string(native.valueOf());
  if (native instanceof Boolean) return boolean(native.valueOf());
  if (native instanceof Date) return Number.isNaN(native.getTime()) ? NULL : string(native.toISOString());
  if (ancestors.has(native)) return NULL;

  ancestors.add(native);
  try {
    if (Array.isArray(native)) {
      return list(native.map((item: unknown) => project(item, ancestors)));
    }
    const entries: Array<[string, Value]> = [];
    if (native instanceof Map) {
      for (const [k, v] of native) {
        if (typeof k === "string") entries.push([k, project(v, ancestors)]);
      }
    } else {
      for (const k of Object.keys(native)) {
        const v = readProperty(native, k);
        if (typeof v !== "function") entries.push([k, project(v, ancestors)]);
      }
    }
    return map(entries);
  } finally {
    ancestors.delete(native);
  }
}

// A getter that throws reads as undefined and so projects to null
function readProperty(obj: object, key: string): unknown {
  try {
    return Reflect.get(obj, key);
  } catch (e) {
    log.ok("property getter failed; projecting null", { key, reason: e instanceof Error ? e.message : String(e) });
    return undefined;
  }
}

/** Inverse of toValue for JSON-shaped data. Maps become plain objects. */
export function toNative(v: Value): unknown {
  switch (v.kind) {
    case "null": return null;
    case "list": return v.items.map(toNative);
    case "map": return Object.fromEntries(Array.from(v.entries, ([k, item]) => [k, toNative(item)] as const));
    case "integer":
    case "unsigned": return nativeInteger(v.value);
    default: return v.value;
  }
}

// ---------- Textual form ----------

export function textOf(v: Value): string {
  switch (v.kind) {
    case "string": return v.value;
    case "integer":
    case "unsigned":
    case "float": return v.value.toString();
    case "boolean": return v.value ? "true" : "false";
    case "null": return "null";
    case "list":
    case "map": return stringifyJson(toNative(v));
  }
}

/** Byte-wise comparison of the UTF-8 encodings. */
export function compareText(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

// ---------- Equality ----------

/**
 * Exact ordering of two numbers of either representation: -1, 0 or 1, or
 * undefined when NaN is involved. A bigint is never rounded to a double.
 */
export function compareNumbers(a: bigint | number, b: bigint | number): number | undefined {
  if (a < b) return -1;
  if (a > b) return 1;
  if ((typeof a === "number" && Number.isNaN(a)) || (typeof b === "number" && Number.isNaN(b))) return undefined;
  return 0;
}

/** Structural equality; the numeric kinds compare by value. */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) || isNumeric(b)) {
    return isNumeric(a) && isNumeric(b) && compareNumbers(a.value, b.value) === 0;
  }
  switch (a.kind) {
    case "null": return b.kind === "null";
    case "string": return b.kind === "string" && a.value === b.value;
    case "boolean": return b.kind === "boolean" && a.value === b.value;
    case "list": {
      if (b.kind !== "list" || a.items.length !== b.items.length) return false;
      return a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && valuesEqual(item, other);
      });
    }
    case "map": {
      if (b.kind !== "map" || a.entries.size !== b.entries.size) return false;
      for (const [k, item] of a.entries) {
        const other = b.entries.get(k);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
  }
}

export function isEmptyish(v: Value): boolean {
  switch (v.kind) {
    case "null": return true;
    case "list": return v.items.length === 0;
    case "map": return v.entries.size === 0;
    default: return false;
  }
}

// ---------- Numeric coercion ----------

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Exact numeric reading: integer kinds and integral text stay bigint. */
export function coerceNumber(v: Value): bigint | number | undefined {
  if (isNumeric(v)) return v.value;
  if (v.kind !== "string") return undefined;
  if (INTEGER_RE.test(v.value)) return BigInt(v.value.replace(/^\+/, ""));
  if (DECIMAL_RE.test(v.value)) return Number(v.value);
  return undefined;
}

export function coerceFloat(v: Value): number | undefined {
  const n = coerceNumber(v);
  return n === undefined ? undefined : Number(n);
}

/** Truncates toward zero, like an integer conversion. */
export function coerceInteger(v: Value): bigint | undefined {
  const n = coerceNumber(v);
  if (n === undefined || typeof n === "bigint") return n;
  return Number.isFinite(n) ? BigInt(Math.trunc(n)) : undefined;
}

export function coerceUnsigned(v: Value): bigint | undefined {
  const n = coerceInteger(v);
  if (n === undefined || n < 0n) return undefined;
  return n;
}

/** Coerce `v` to the numeric kind of `field`. */
export function coerceLike(field: NumericValue, v: Value): bigint | number | undefined {
  switch (field.kind) {
    case "integer": return coerceInteger(v);
    case "unsigned": return coerceUnsigned(v);
    case "float": return coerceFloat(v);
  }
}
