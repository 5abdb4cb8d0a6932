import { Environment } from "@weft/sys";
import type { TelemetryAuthMode, TelemetryConfig } from "./types.js";

const AUTH_MODES: readonly TelemetryAuthMode[] = ["apiKey", "bearer", "none"];

function parseAuthMode(value: string | undefined): TelemetryAuthMode | undefined {
  return AUTH_MODES.find((mode) => mode === value);
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Default telemetry configuration from environment variables.
 * Can be overridden by passing config to createTelemetryClient().
 */
export function resolveDefaultConfig(): Omit<TelemetryConfig, "serviceId"> {
  const endpoint = process.env.TELEMETRY_ENDPOINT || "";
  const explicitEnabled = process.env.TELEMETRY_ENABLED;
  const apiKey = process.env.TELEMETRY_API_KEY || "";
  const bearer = process.env.TELEMETRY_BEARER || "";

  return {
    enabled: explicitEnabled ? explicitEnabled === "true" : Boolean(endpoint),
    endpoint,
    authMode:
      parseAuthMode(process.env.TELEMETRY_AUTH_MODE) ||
      (apiKey ? "apiKey" : bearer ? "bearer" : "none"),
    apiKey,
    bearer,
    env: process.env.TELEMETRY_ENV || Environment.name,
    maxBatch: parseIntEnv(process.env.TELEMETRY_MAX_BATCH, 50),
    flushMs: parseIntEnv(process.env.TELEMETRY_FLUSH_MS, 1000),
    retry: parseIntEnv(process.env.TELEMETRY_RETRY, 3),
    maxQueue: parseIntEnv(process.env.TELEMETRY_MAX_QUEUE, 1000),
  };
}

/**
 * Normalize endpoint URL
 * - Remove trailing slashes
 * - Ensure /api suffix
 */
export function normalizeEndpoint(endpoint: string): string {
  if (!endpoint) return "";
  const trimmed = endpoint.replace(/\/+$/, "");
  return trimmed.endsWith("/api") ? trimmed : `${trimmed}/api`;
}

/**
 * Build HTTP headers for telemetry requests
 */
export function getHeaders(config: TelemetryConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "X-Service-Id": config.serviceId,
    "X-Env": config.env,
  };

  if (config.authMode === "apiKey" && config.apiKey) {
    headers["X-API-Key"] = config.apiKey;
  }

  if (config.authMode === "bearer" && config.bearer) {
    headers["Authorization"] = `Bearer ${config.bearer}`;
  }

  return headers;
}

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Build base metadata for telemetry entries
 */
export function buildBaseMetadata(config: TelemetryConfig): Record<string, unknown> {
  return {
    serviceId: config.serviceId,
    env: config.env,
  };
}

/**
 * Clamp queue size by removing oldest entries
 */
export function clampQueue(queue: Array<unknown>, maxQueue: number): void {
  while (queue.length > maxQueue) {
    queue.shift();
  }
}
