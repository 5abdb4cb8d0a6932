import type { Express, IRouter, Request, Response, RequestHandler } from "express";
import type { TelemetryClient } from "@weft/trace";

export type HttpMethod = "get" | "put" | "post" | "delete" | "patch" | "head" | "options";

/**
 * OpenAPI operations for one path, keyed by lower-case method
 */
export type OpenApiPathItem = Partial<Record<HttpMethod, Record<string, unknown>>> & {
  summary?: string;
  description?: string;
  parameters?: unknown[];
};

/**
 * Registers one or more path handlers.
 *
 * Exported router objects that live next to (or below) the module passed as
 * `discover` are picked up automatically.
 */
export interface Router {
  route(router: IRouter): void | Promise<void>;

  /**
   * OpenAPI path items this router serves, merged into /openapi
   */
  openApi?: Record<string, OpenApiPathItem>;
}

/**
 * Adds attributes to the span recorded for every request
 */
export interface WebTraceExtraBuilder {
  build(req: Request, res: Response): Record<string, unknown> | null;
}

/**
 * Graceful shutdown configuration
 */
export interface ShutdownConfig {
  /**
   * Grace period in ms before forcefully closing connections
   * @default 30000 (30 seconds)
   */
  gracePeriodMs?: number;

  /**
   * Custom shutdown hooks to run during graceful shutdown
   */
  hooks?: Array<() => Promise<void> | void>;
}

/**
 * Server options. Ports, CORS, OpenAPI and trace settings come from config
 * (`web.*` keys), everything wired in code comes from here.
 */
export interface WebServerOptions {
  /**
   * Extra configuration of the Express app, run before routers are registered
   */
  setup?: (app: Express) => void | Promise<void>;

  /**
   * Routers registered in addition to the discovered ones
   */
  routers?: Router[];

  /**
   * Module URL (usually `import.meta.url`) or directory whose tree is scanned for routers
   */
  discover?: string | URL;

  /**
   * Telemetry client receiving spans, metrics and error events
   */
  telemetry?: TelemetryClient;

  /**
   * Enable request/response logging
   * @default true
   */
  enableLogging?: boolean;

  /**
   * Custom middleware to run after standard setup
   */
  middleware?: RequestHandler[];

  /**
   * Serve GET /health
   * @default true
   */
  health?: boolean;

  shutdown?: ShutdownConfig;
}

/**
 * Health check result
 */
export interface HealthCheckResult {
  status: "ok" | "degraded";
  timestamp: string;
}
