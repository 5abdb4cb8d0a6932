/**
 * Authentication mode for telemetry endpoint
 * - "apiKey": Use X-API-Key header
 * - "bearer": Use Authorization: Bearer header with provided token
 * - "none": No authentication
 */
export type TelemetryAuthMode = "apiKey" | "bearer" | "none";

/**
 * Telemetry client configuration
 */
export type TelemetryConfig = {
  /** Enable/disable telemetry */
  enabled: boolean;

  /** Telemetry endpoint URL */
  endpoint: string;

  /** Authentication mode */
  authMode: TelemetryAuthMode;

  /** API key for apiKey auth mode */
  apiKey: string;

  /** Bearer token for bearer auth mode */
  bearer: string;

  /** Service ID (unique identifier for this service) */
  serviceId: string;

  /** Environment (local, test, prod) */
  env: string;

  /** Maximum batch size before forcing flush */
  maxBatch: number;

  /** Flush interval in milliseconds */
  flushMs: number;

  /** Number of retry attempts */
  retry: number;

  /** Maximum queue size (older entries dropped when exceeded) */
  maxQueue: number;
};

export type LogEntry = {
  timestamp: string;
  level: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type MetricEntry = {
  name: string;
  timestamp: string;
  value: number;
  labels?: Record<string, unknown>;
};

/**
 * Distributed tracing span entry
 */
export type SpanEntry = {
  traceId: string;
  spanId: string;
  parentSpanId?: string | null;
  name: string;
  serviceName?: string;
  kind?: string;
  status?: "ok" | "error";
  startTime: string;
  endTime?: string;
  attributes?: Record<string, unknown>;
};

/**
 * Telemetry client interface
 */
export interface TelemetryClient {
  /**
   * Log a message with level and optional metadata
   */
  log(level: string, message: string, metadata?: Record<string, unknown>): void;

  /**
   * Track a domain event
   */
  event(eventType: string, message: string, metadata?: Record<string, unknown>, level?: string): void;

  /**
   * Record a metric value
   */
  metric(name: string, value: number, labels?: Record<string, unknown>): void;

  /**
   * Record a distributed tracing span
   */
  span(spanData: SpanEntry): void;

  /**
   * Manually flush all pending telemetry data
   */
  flush(): Promise<void>;

  /**
   * Gracefully shutdown telemetry client (flush and stop timers)
   */
  shutdown(): Promise<void>;
}

export type MetricDefinition = {
  type: "counter" | "histogram" | "gauge";
  description: string;
};
