/**
 * Metrics Module
 *
 * Fixed-name counters and gauges fed by the pipeline and the daemon
 * monitor, rendered for Prometheus by the /metrics route.
 */

export { MetricRegistry } from "./metric-registry.js";
export type {
  MetricRegistryOptions,
  AggregateKey,
  CounterKey,
  GaugeKey,
  MetricKey,
} from "./metric-registry.js";
export { localMetricsUrl, parseExposition, scrapeMetrics } from "./exposition-parser.js";
export type { ExpositionSample } from "./exposition-parser.js";
