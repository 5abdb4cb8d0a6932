import type { MetricDefinition } from "./types.js";

/**
 * Standard metric definitions recorded by the web layer
 */
export const METRIC_DEFINITIONS: Record<string, MetricDefinition> = {
  "web.request.count": {
    type: "counter",
    description: "Total HTTP requests",
  },
  "web.error.count": {
    type: "counter",
    description: "Total HTTP requests answered with 5xx",
  },
  "web.request.latency_ms": {
    type: "histogram",
    description: "HTTP request latency (ms)",
  },
};

/**
 * Get metric definition, falling back to gauge for custom metrics
 */
export function getMetricDefinition(name: string): MetricDefinition {
  return METRIC_DEFINITIONS[name] || { type: "gauge", description: "Custom metric" };
}
