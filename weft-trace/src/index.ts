/**
 * @weft/trace - Telemetry, request tracing and error reporting
 *
 * - Batched telemetry shipping (logs, metrics, spans) with retry and bounded queues
 * - Request-scoped trace context propagated with AsyncLocalStorage
 * - Pluggable error reporter that defaults to telemetry events
 *
 * @example
 * ```typescript
 * import { createTelemetryClient, createTraceContext, Trace, ErrorReporter } from '@weft/trace';
 *
 * Trace.useClient(createTelemetryClient({ serviceId: 'orders-api' }));
 *
 * Trace.run(createTraceContext(), () => {
 *   Trace.start('Job', 'nightly-export');
 *   try {
 *     exportOrders();
 *   } catch (err) {
 *     ErrorReporter.report(err);
 *   }
 *   Trace.finish('nightly-export');
 * });
 * ```
 */

export * from "./types.js";
export * from "./client.js";
export * from "./config.js";
export * from "./metrics.js";
export * from "./trace.js";
export * from "./error-reporter.js";
