import { LRUCache } from "lru-cache";
import type { Query } from "../filter/ast.js";

export type QueryCache = LRUCache<string, Query>;

export interface QueryCacheOptions {
  max?: number | undefined;
  ttlMs?: number | undefined;
}

/** Parsed queries keyed by their source text. */
export function makeQueryCache(opts: QueryCacheOptions = {}): QueryCache {
  return new LRUCache<string, Query>({
    max: opts.max ?? 1000,
    ttl: opts.ttlMs ?? 60_000,
    allowStale: false,
  });
}

/** Parse `text` through the cache; parse failures are not cached. */
export function cachedParse(cache: QueryCache, text: string, parse: (text: string) => Query): Query {
  const hit = cache.get(text);
  if (hit) return hit;
  const q = parse(text);
  cache.set(text, q);
  return q;
}
