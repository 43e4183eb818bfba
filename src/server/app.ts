// src/server/app.ts
import express from "express";
import type { Request, Response, NextFunction } from "express";
import type { ServiceConfig } from "../config.js";
import { makeQueryCache } from "../core/Cache.js";
import { getLog } from "../utils/logger.js";
import { bodyLimit, securityMiddleware } from "./hardening.js";
import { buildRouter, statusFor } from "./routes.js";

const log = getLog("QueryService");

// Errors raised by body parsers carry an HTTP status
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function createApp(config: ServiceConfig) {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", config.trustProxy);

  app.use(...securityMiddleware(config.rateLimitPerMinute));
  app.use(...bodyLimit(config.bodyLimit));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      log.info("request completed", { method: req.method, path: req.path, status: res.statusCode, durationMs });
    });
    next();
  });

  app.get("/health", (_req: Request, res: Response) => res.json({ status: "ok" }));

  const cache = makeQueryCache({ max: config.queryCacheSize, ttlMs: config.queryCacheTtlMs });
  app.use("/queries", buildRouter({ cache, maxRecords: config.maxRecords }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const code = httpStatusOf(err) ?? statusFor(err);
    const message = err instanceof Error ? err.message : String(err);
    if (code >= 500) {
      log.error("unhandled request error", {}, err instanceof Error ? err : undefined);
      res.status(code).json({ error: "Internal error" });
      return;
    }
    res.status(code).json({ error: message });
  });

  return app;
}
