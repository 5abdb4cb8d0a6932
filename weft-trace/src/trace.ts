import { AsyncLocalStorage } from "async_hooks";
import { newUUID4 } from "@weft/sys";
import type { SpanEntry, TelemetryClient } from "./types.js";

/**
 * Request details kept for error reports
 */
export interface RequestContext {
  method: string;
  url: string;
  path: string;
  headers: Record<string, string>;
}

/**
 * Request-scoped trace state
 */
export interface TraceContext {
  traceId: string;
  sessionId: string | null;
  type: string | null;
  name: string | null;
  startTime: number | null;
  extra: Record<string, unknown>;
  error: boolean;
  finished: boolean;
  /** Set by ErrorReporter.setContext; survives Trace.clear() */
  request: RequestContext | null;
}

export function createTraceContext(): TraceContext {
  return {
    traceId: newUUID4(),
    sessionId: null,
    type: null,
    name: null,
    startTime: null,
    extra: {},
    error: false,
    finished: false,
    request: null,
  };
}

const storage = new AsyncLocalStorage<TraceContext>();
let client: TelemetryClient | null = null;

function finishContext(
  context: TraceContext,
  name: string,
  extra: Record<string, unknown> | null
): SpanEntry | null {
  if (context.startTime === null || context.finished) return null;
  context.finished = true;

  const endTime = Date.now();
  const span: SpanEntry = {
    traceId: context.traceId,
    spanId: newUUID4(),
    parentSpanId: null,
    name,
    kind: "server",
    status: context.error ? "error" : "ok",
    startTime: new Date(context.startTime).toISOString(),
    endTime: new Date(endTime).toISOString(),
    attributes: {
      ...context.extra,
      ...(extra ?? {}),
      type: context.type,
      sessionId: context.sessionId,
      durationMs: endTime - context.startTime,
    },
  };

  client?.span(span);
  return span;
}

/**
 * Request-scoped tracing.
 *
 * The HTTP layer opens a context per request with `Trace.run`; everything
 * called while handling that request sees it through `Trace.current()`.
 * Calls made outside a context are ignored.
 */
export const Trace = {
  run<T>(context: TraceContext, fn: () => T): T {
    return storage.run(context, fn);
  },

  current(): TraceContext | undefined {
    return storage.getStore();
  },

  clear(): void {
    const context = storage.getStore();
    if (!context) return;
    const { request } = context;
    Object.assign(context, createTraceContext(), { request });
  },

  sessionId(sessionId: string): void {
    const context = storage.getStore();
    if (context) context.sessionId = sessionId;
  },

  start(type: string, name: string, extra: Record<string, unknown> = {}): void {
    const context = storage.getStore();
    if (!context) return;
    context.type = type;
    context.name = name;
    context.startTime = Date.now();
    context.extra = { ...extra };
  },

  markFailed(): void {
    const context = storage.getStore();
    if (context) context.error = true;
  },

  /**
   * Finish the current trace and emit its span
   */
  finish(name: string, extra: Record<string, unknown> | null = null): SpanEntry | null {
    const context = storage.getStore();
    return context ? finishContext(context, name, extra) : null;
  },

  /**
   * Finish a trace held outside its async scope, e.g. from a response "finish" listener
   */
  finishContext(context: TraceContext, name: string, extra: Record<string, unknown> | null = null): SpanEntry | null {
    return finishContext(context, name, extra);
  },

  useClient(telemetry: TelemetryClient | null): void {
    client = telemetry;
  },

  client(): TelemetryClient | null {
    return client;
  },
};
