import type { Request, Response, NextFunction } from "express";
import { log } from "@weft/sys";
import type { TelemetryClient } from "@weft/trace";

export { log };

const REDACTED_FIELDS = ["password", "token", "apiKey", "secret"];
const MAX_LOGGED_BODY = 500;

export interface LoggingMiddlewareOptions {
  verbose?: boolean;
  telemetry?: TelemetryClient;
  excludePaths?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy of a request body with credentials masked
 */
export function redactBody(body: Record<string, unknown>): Record<string, unknown> {
  const sanitized = { ...body };
  for (const field of REDACTED_FIELDS) {
    if (sanitized[field]) sanitized[field] = "[REDACTED]";
  }
  return sanitized;
}

function truncated(json: string): string {
  return json.length > MAX_LOGGED_BODY
    ? `${json.substring(0, MAX_LOGGED_BODY)}... [truncated ${json.length} bytes]`
    : json;
}

/**
 * Create request/response logging middleware
 *
 * When telemetry is provided, sends `http.request` / `http.response` events
 * in addition to console output.
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions = {}) {
  const verbose = options.verbose ?? false;
  const telemetry = options.telemetry;
  const excludePathsSet = new Set(options.excludePaths || []);

  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    if (excludePathsSet.has(path)) {
      next();
      return;
    }

    const headers: Record<string, string> = {};
    for (const name of ["x-trace-id", "content-type"]) {
      const value = req.get(name);
      if (value) headers[name] = value;
    }

    const requestInfo: Record<string, unknown> = {
      method: req.method,
      path,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
      headers: Object.keys(headers).length > 0 ? headers : undefined,
    };

    const body: unknown = req.body;
    if (req.method !== "GET" && isRecord(body) && Object.keys(body).length > 0) {
      requestInfo.body = redactBody(body);
    }

    if (verbose) {
      log(`→ ${req.method} ${path} ${JSON.stringify(requestInfo)}`);
    }

    telemetry?.event("http.request", `${req.method} ${path}`, { ...requestInfo, direction: "inbound" }, "debug");

    const originalJson = res.json.bind(res);
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      const status = res.statusCode;

      let logLine = `← ${req.method} ${path} ${status} in ${duration}ms`;
      if (verbose && capturedJsonResponse !== undefined) {
        logLine += ` :: ${truncated(JSON.stringify(capturedJsonResponse))}`;
      }
      log(logLine);

      if (telemetry) {
        const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
        telemetry.event(
          "http.response",
          `${req.method} ${path} ${status}`,
          { method: req.method, path, status, duration, direction: "outbound" },
          level
        );
      }
    });

    next();
  };
}
