import type { Request, Response, NextFunction } from "express";

const ALLOWED_METHODS = "GET, POST, PUT, PATCH, DELETE, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, Authorization, X-Trace-Id";

/**
 * "*" for any origin, otherwise the allowed origin patterns
 */
export type CorsOrigins = "*" | string[];

/**
 * Parse the `web.corsOrigins` setting: `*` or a comma separated list
 */
export function parseCorsOrigins(value: string): CorsOrigins {
  if (value.trim() === "*") return "*";
  return value
    .split(",")
    .map((origin) => origin.trim().replace(/\/$/, ""))
    .filter(Boolean);
}

/**
 * Check if origin matches a pattern (supports wildcards like *.example.com)
 */
export function matchesOrigin(origin: string, pattern: string): boolean {
  if (pattern === "*") return true;
  if (pattern === origin) return true;

  if (pattern.startsWith("*.")) {
    const suffix = pattern.slice(1);
    try {
      const url = new URL(origin);
      return url.hostname.endsWith(suffix);
    } catch {
      return false;
    }
  }

  return false;
}

/**
 * Create CORS middleware
 */
export function createCorsMiddleware(origins: CorsOrigins) {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    let allowed = false;

    if (origins === "*") {
      res.header("Access-Control-Allow-Origin", "*");
      allowed = true;
    } else {
      res.vary("Origin");
      if (origin) {
        const normalizedOrigin = origin.replace(/\/$/, "");
        if (origins.some((pattern) => matchesOrigin(normalizedOrigin, pattern))) {
          res.header("Access-Control-Allow-Origin", normalizedOrigin);
          res.header("Access-Control-Allow-Credentials", "true");
          allowed = true;
        }
      }
    }

    if (allowed) {
      res.header("Access-Control-Allow-Methods", ALLOWED_METHODS);
      res.header("Access-Control-Allow-Headers", ALLOWED_HEADERS);
      res.header("Access-Control-Max-Age", "86400");
    }

    // Preflight: 403 for disallowed origins
    if (req.method === "OPTIONS" && req.headers["access-control-request-method"]) {
      res.sendStatus(origin && !allowed ? 403 : 204);
      return;
    }

    next();
  };
}
