// src/config.ts
import { z } from "zod";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(v => v === "true" || v === "1");

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z
      .string()
      .transform(v => v.toUpperCase())
      .pipe(z.enum(["OK", "INFO", "WARN", "ERROR", "SILENT"]))
      .default("INFO"),
  LOG_PRETTY: booleanFlag.default("false"),
  // unset: no proxy trusted; a hop count, "true"/"false", or an express trust-proxy expression
  TRUST_PROXY: z.string().optional(),
  BODY_LIMIT: z.string().min(1).default("512kb"),
  QUERY_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  QUERY_CACHE_TTL_MS: z.coerce.number().int().positive().default(60_000),
  MAX_RECORDS: z.coerce.number().int().positive().default(10_000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(300),
});

export type ServiceConfig = {
  port: number;
  logLevel: "OK" | "INFO" | "WARN" | "ERROR" | "SILENT";
  logPretty: boolean;
  trustProxy: boolean | number | string | string[];
  bodyLimit: string;
  queryCacheSize: number;
  queryCacheTtlMs: number;
  maxRecords: number;
  rateLimitPerMinute: number;
};

function trustProxySetting(raw: string | undefined): ServiceConfig["trustProxy"] {
  if (!raw) return 0;
  if (/^\d+$/.test(raw)) return parseInt(raw, 10);
  if (raw.includes(",")) return raw.split(",").map(s => s.trim());
  if (raw === "true" || raw === "false") return raw === "true";
  return raw;
}

/** Read service settings from the environment; unset or empty keys take defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    logPretty: c.LOG_PRETTY,
    trustProxy: trustProxySetting(c.TRUST_PROXY),
    bodyLimit: c.BODY_LIMIT,
    queryCacheSize: c.QUERY_CACHE_SIZE,
    queryCacheTtlMs: c.QUERY_CACHE_TTL_MS,
    maxRecords: c.MAX_RECORDS,
    rateLimitPerMinute: c.RATE_LIMIT_PER_MINUTE,
  };
}
