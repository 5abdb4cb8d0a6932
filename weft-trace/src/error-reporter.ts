import { Trace, type RequestContext } from "./trace.js";

/**
 * Receives uncaught request errors
 */
export interface Reporter {
  report(error: unknown, context: RequestContext | null): void;
}

/**
 * Sends errors to the telemetry client Trace is using
 */
export const telemetryReporter: Reporter = {
  report(error, context) {
    const telemetry = Trace.client();
    if (!telemetry) return;

    const err = error instanceof Error ? error : new Error(String(error));
    telemetry.event(
      "service.error",
      err.message,
      {
        errorName: err.name,
        stack: err.stack,
        traceId: Trace.current()?.traceId,
        request: context ?? undefined,
      },
      "error"
    );
  },
};

let reporter: Reporter = telemetryReporter;

export const ErrorReporter = {
  /**
   * Remember the request being handled for later reports
   */
  setContext(context: RequestContext): void {
    const trace = Trace.current();
    if (trace) trace.request = context;
  },

  context(): RequestContext | null {
    return Trace.current()?.request ?? null;
  },

  report(error: unknown): void {
    Trace.markFailed();
    reporter.report(error, ErrorReporter.context());
  },

  use(next: Reporter): void {
    reporter = next;
  },

  reset(): void {
    reporter = telemetryReporter;
  },
};
