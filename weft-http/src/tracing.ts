import { AsyncResource } from "async_hooks";
import type { Request, Response, NextFunction } from "express";
import { logError } from "@weft/sys";
import { ErrorReporter, Trace, createTraceContext, type RequestContext, type TelemetryClient } from "@weft/trace";
import { resolveSessionId } from "./session.js";
import type { WebTraceExtraBuilder } from "./types.js";

export const EmptyWebTraceExtraBuilder: WebTraceExtraBuilder = {
  build: () => null,
};

export function isWebTraceExtraBuilder(value: unknown): value is WebTraceExtraBuilder {
  return typeof value === "object" && value !== null && "build" in value && typeof value.build === "function";
}

const REPORTED_HEADERS = ["user-agent", "content-type", "referer", "x-trace-id"];

function buildRequestContext(req: Request): RequestContext {
  const headers: Record<string, string> = {};
  for (const name of REPORTED_HEADERS) {
    const value = req.get(name);
    if (value) headers[name] = value;
  }
  return { method: req.method, url: req.originalUrl, path: req.path, headers };
}

/**
 * Route pattern that handled the request ("/orders/:id"), or the raw path
 * when no route matched
 */
export function endpointHandlerPath(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === "object" && route !== null && "path" in route && typeof route.path === "string") {
    return `${req.baseUrl}${route.path}`;
  }
  return req.path;
}

function buildExtra(builder: WebTraceExtraBuilder, req: Request, res: Response): Record<string, unknown> | null {
  try {
    return builder.build(req, res);
  } catch (err) {
    logError("Trace extra builder failed", err, "trace");
    return null;
  }
}

export interface TraceMiddlewareOptions {
  extraBuilder: WebTraceExtraBuilder;
  telemetry?: TelemetryClient;
}

/**
 * Run a middleware that continues from stream callbacks (body parsers) so
 * that the rest of the chain keeps the request's trace
 */
export function bindTraceContext(handler: (req: Request, res: Response, next: NextFunction) => void) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, AsyncResource.bind(next));
  };
}

/**
 * Open a trace for every request.
 *
 * Before the request: error-reporter context, trace reset, session cookie,
 * trace start. Once the response is sent or the connection drops: trace
 * finish with the matched route pattern, plus request metrics.
 */
export function createTraceMiddleware({ extraBuilder, telemetry }: TraceMiddlewareOptions) {
  return (req: Request, res: Response, next: NextFunction) => {
    const context = createTraceContext();

    Trace.run(context, () => {
      ErrorReporter.setContext(buildRequestContext(req));
      Trace.clear();
      Trace.sessionId(resolveSessionId(req, res));
      Trace.start("Web", req.path, { url: req.path });
      res.setHeader("x-trace-id", context.traceId);

      const finish = () => {
        if (context.finished) return;
        const endpoint = endpointHandlerPath(req);
        const status = res.statusCode;
        const span = Trace.finishContext(context, endpoint, buildExtra(extraBuilder, req, res));

        if (!span || !telemetry) return;
        const labels = { endpoint, method: req.method, status: String(status) };
        const durationMs = span.attributes?.durationMs;

        telemetry.metric("web.request.count", 1, labels);
        if (typeof durationMs === "number") {
          telemetry.metric("web.request.latency_ms", durationMs, labels);
        }
        if (status >= 500) {
          telemetry.metric("web.error.count", 1, labels);
        }
      };
      res.on("finish", finish);
      res.on("close", finish);

      next();
    });
  };
}
