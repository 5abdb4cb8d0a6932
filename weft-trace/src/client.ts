import { log as consoleLog, logError } from "@weft/sys";
import type { TelemetryClient, TelemetryConfig, LogEntry, MetricEntry, SpanEntry } from "./types.js";
import {
  resolveDefaultConfig,
  normalizeEndpoint,
  getHeaders,
  nowIso,
  buildBaseMetadata,
  clampQueue,
} from "./config.js";
import { getMetricDefinition } from "./metrics.js";

/**
 * Client that drops everything
 */
export function createNoopTelemetryClient(): TelemetryClient {
  return {
    log: () => undefined,
    event: () => undefined,
    metric: () => undefined,
    span: () => undefined,
    flush: async () => undefined,
    shutdown: async () => undefined,
  };
}

/**
 * Bounded FIFO of pending entries; the oldest are dropped past `maxQueue`
 */
class BatchQueue<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly maxQueue: number,
    private readonly ship: (batch: T[]) => Promise<void>
  ) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    clampQueue(this.items, this.maxQueue);
  }

  /**
   * Ship batches until the queue is empty, including entries added meanwhile
   */
  async drain(maxBatch: number): Promise<void> {
    while (this.items.length > 0) {
      await this.ship(this.items.splice(0, maxBatch));
    }
  }
}

function backoffMs(attempt: number): number {
  return Math.min(1000 * (attempt + 1), 5000);
}

/**
 * Create a telemetry client instance
 *
 * @param overrides - Partial config to override defaults from environment
 * @returns TelemetryClient instance (or no-op client if disabled)
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetryClient({
 *   serviceId: 'orders-api',
 * });
 *
 * telemetry.event('service.started', 'Service initialized');
 * telemetry.metric('web.request.count', 1);
 * ```
 */
export function createTelemetryClient(
  overrides: Partial<TelemetryConfig> & { serviceId: string }
): TelemetryClient {
  const defaults = resolveDefaultConfig();
  const config: TelemetryConfig = {
    ...defaults,
    ...overrides,
    endpoint: normalizeEndpoint(overrides.endpoint || defaults.endpoint),
  };

  if (!config.enabled || !config.endpoint) {
    return createNoopTelemetryClient();
  }

  /**
   * POST one batch. Failed attempts are retried `config.retry` times, then
   * the batch is dropped.
   */
  async function post(path: string, body: Record<string, unknown>): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        const res = await fetch(`${config.endpoint}${path}`, {
          method: "POST",
          headers: getHeaders(config),
          body: JSON.stringify(body),
        });
        if (res.ok) return;
        throw new Error(`Telemetry request failed: ${res.status} ${await res.text()}`);
      } catch (err) {
        if (attempt >= config.retry) {
          consoleLog(`Dropping telemetry batch for ${path}: ${err instanceof Error ? err.message : String(err)}`, "telemetry");
          return;
        }
        await new Promise((resolve) => setTimeout(resolve, backoffMs(attempt)));
      }
    }
  }

  const logs = new BatchQueue<LogEntry>(config.maxQueue, (entries) => post("/logs", { entries }));

  // One request per metric name
  const metrics = new BatchQueue<MetricEntry>(config.maxQueue, async (batch) => {
    const byName = new Map<string, Array<Omit<MetricEntry, "name">>>();
    for (const { name, ...point } of batch) {
      byName.set(name, [...(byName.get(name) ?? []), point]);
    }

    for (const [name, dataPoints] of byName) {
      const { type, description } = getMetricDefinition(name);
      await post("/metrics", { name, metricType: type, description, dataPoints });
    }
  });

  const spans = new BatchQueue<SpanEntry>(config.maxQueue, (batch) => post("/traces", { spans: batch }));

  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  /**
   * Send everything queued. Concurrent callers share the running flush.
   */
  function flush(): Promise<void> {
    if (!inFlight) {
      inFlight = (async () => {
        while (logs.size + metrics.size + spans.size > 0) {
          await logs.drain(config.maxBatch);
          await metrics.drain(config.maxBatch);
          await spans.drain(config.maxBatch);
        }
      })().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  function scheduleFlush(): void {
    if (timer) return;

    timer = setInterval(() => {
      flush().catch((err: unknown) => logError("Telemetry flush failed", err, "telemetry"));
    }, config.flushMs);
    timer.unref();
  }

  function event(
    eventType: string,
    message: string,
    metadata: Record<string, unknown> = {},
    level = "info"
  ): void {
    log(level, message, { eventType, ...metadata });
  }

  function log(level: string, message: string, metadata: Record<string, unknown> = {}): void {
    logs.push({ timestamp: nowIso(), level, message, metadata: { ...buildBaseMetadata(config), ...metadata } });
    scheduleFlush();
  }

  return {
    log,
    event,
    metric(name, value, labels = {}) {
      metrics.push({ name, timestamp: nowIso(), value, labels: { ...buildBaseMetadata(config), ...labels } });
      scheduleFlush();
    },
    span(spanData) {
      spans.push({
        ...spanData,
        serviceName: spanData.serviceName || config.serviceId,
        attributes: { ...buildBaseMetadata(config), ...spanData.attributes },
      });
      scheduleFlush();
    },
    flush,
    async shutdown() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      await flush();
    },
  };
}
