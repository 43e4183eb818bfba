// src/filter/record.ts
import { getLog } from "../utils/logger.js";
import { toValue } from "./value.js";
import type { Value } from "./value.js";

const log = getLog("RecordResolver");

export type Lookup = { found: true; value: Value } | { found: false };

const ABSENT: Lookup = Object.freeze({ found: false });

/**
 * Dynamic lookup capability. A record exposing `getField` is resolved through
 * it alone: a returned value (even `undefined`) is present, a throw means the
 * field is absent.
 */
export interface FieldGetter {
  getField(name: string): unknown;
}

/** Closed form every record input is resolved into. */
export interface RecordView {
  readonly capability: "getter" | "keyed" | "fields";
  lookup(name: string): Lookup;
}

export function isFieldGetter(input: unknown): input is FieldGetter {
  return typeof input === "object" && input !== null
      && "getField" in input && typeof input.getField === "function";
}

/**
 * Resolve an input into a RecordView. `null`/`undefined`, primitives and
 * arrays are not records and yield `undefined`.
 */
export function resolveRecord(input: unknown): RecordView | undefined {
  if (isFieldGetter(input)) return getterView(input);
  if (input instanceof Map) return keyedView(input);
  if (typeof input === "object" && input !== null && !Array.isArray(input)) return fieldsView(input);
  return undefined;
}

function getterView(getter: FieldGetter): RecordView {
  return {
    capability: "getter",
    lookup(name) {
      let raw: unknown;
      try {
        raw = getter.getField(name);
      } catch (e) {
        log.ok("getter reported field as absent", { field: name, reason: e instanceof Error ? e.message : String(e) });
        return ABSENT;
      }
      return { found: true, value: toValue(raw) };
    },
  };
}

function keyedView(m: Map<unknown, unknown>): RecordView {
  return {
    capability: "keyed",
    lookup(name) {
      if (!m.has(name)) return ABSENT;
      return { found: true, value: toValue(m.get(name)) };
    },
  };
}

function fieldsView(obj: object): RecordView {
  return {
    capability: "fields",
    lookup(name) {
      const own = Object.prototype.hasOwnProperty.call(obj, name);
      // Class accessors live on the prototype; Object.prototype members are not fields
      if (!own && (!(name in obj) || name in Object.prototype)) return ABSENT;
      let raw: unknown;
      try {
        raw = Reflect.get(obj, name);
      } catch (e) {
        log.ok("accessor reported field as absent", { field: name, reason: e instanceof Error ? e.message : String(e) });
        return ABSENT;
      }
      if (!own && typeof raw === "function") return ABSENT;
      return { found: true, value: toValue(raw) };
    },
  };
}

/** Resolve `name` on any input; non-records have no fields. */
export function lookupField(input: unknown, name: string): Lookup {
  const view = resolveRecord(input);
  return view ? view.lookup(name) : ABSENT;
}
