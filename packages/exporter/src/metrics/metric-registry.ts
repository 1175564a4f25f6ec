/**
 * Metric Registry — the only state shared between the pipeline and the
 * HTTP listener.
 *
 * Wraps a dedicated prom-client Registry (never the global default) whose
 * metric set is fixed at construction: one counter per pattern rule plus
 * the aggregate counters and gauges below. Increments are synchronous, so
 * a scrape can never observe a half-applied update of a single counter.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import type { EventLabel, PatternRule } from "@arpwatch-exporter/shared";
import { UnknownMetricError } from "../errors.js";

/** Counters that move on their own; label counters only move through recordEvent */
export type AggregateKey = "total_events" | "unrecognized_lines";
export type CounterKey = EventLabel | AggregateKey;
export type GaugeKey = "last_activity_timestamp" | "daemon_up";
export type MetricKey = CounterKey | GaugeKey;

export interface MetricRegistryOptions {
  /** Metric name prefix (default: "arpwatch") */
  prefix?: string;
  /** Also export Node.js process metrics (default: false) */
  collectDefaultMetrics?: boolean;
  /** Register the daemon liveness gauge (default: true) */
  processHealth?: boolean;
  /** Clock in ms, for the timestamp gauge */
  now?: () => number;
}

const DEFAULT_PREFIX = "arpwatch";
const GAUGE_KEYS: readonly GaugeKey[] = ["last_activity_timestamp", "daemon_up"];

function isGaugeKey(name: MetricKey): name is GaugeKey {
  return GAUGE_KEYS.some((key) => key === name);
}

export class MetricRegistry {
  readonly prefix: string;
  private registry = new Registry();
  private counters = new Map<CounterKey, Counter>();
  private gauges = new Map<GaugeKey, Gauge>();
  private now: () => number;

  constructor(rules: readonly PatternRule[], options?: MetricRegistryOptions) {
    this.prefix = options?.prefix ?? DEFAULT_PREFIX;
    this.now = options?.now ?? Date.now;

    for (const rule of rules) {
      this.addCounter(rule.label, `${this.prefix}_${rule.label}_total`, rule.description);
    }
    this.addCounter(
      "total_events",
      `${this.prefix}_events_total`,
      "Total classified events across all types",
    );
    this.addCounter(
      "unrecognized_lines",
      `${this.prefix}_unrecognized_lines_total`,
      "Daemon log lines that matched no known event type",
    );
    this.addGauge(
      "last_activity_timestamp",
      `${this.prefix}_last_activity_timestamp_seconds`,
      "Unix time of the most recent classified event",
    );
    // Without a monitor a constant 0 would read as "daemon down"
    if (options?.processHealth ?? true) {
      this.addGauge(
        "daemon_up",
        `${this.prefix}_process_health`,
        "Whether the monitored daemon process is running (1) or not (0)",
      );
    }

    if (options?.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  /** Content-Type for the text exposition format */
  get contentType(): string {
    return this.registry.contentType;
  }

  /** Every metric key, counters first */
  get keys(): MetricKey[] {
    return [...this.counters.keys(), ...this.gauges.keys()];
  }

  /** Add 1 to an aggregate counter */
  increment(name: AggregateKey): void {
    this.counter(name).inc();
  }

  /**
   * Count one classified event: the label counter, the total and the
   * last-activity gauge, all in the same tick.
   */
  recordEvent(label: EventLabel): void {
    const labelCounter = this.counter(label);
    labelCounter.inc();
    this.counter("total_events").inc();
    this.setGaugeNow("last_activity_timestamp");
  }

  /** Set a gauge to the current Unix time in seconds */
  setGaugeNow(name: GaugeKey): void {
    this.gauge(name).set(this.now() / 1000);
  }

  setGauge(name: GaugeKey, value: number): void {
    this.gauge(name).set(value);
  }

  /** Current value of one metric (0 if never touched) */
  async read(name: MetricKey): Promise<number> {
    const metric = isGaugeKey(name) ? this.gauge(name) : this.counter(name);
    const { values } = await metric.get();
    return values[0]?.value ?? 0;
  }

  /** Render every metric in the Prometheus text format */
  async renderSnapshot(): Promise<string> {
    return this.registry.metrics();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private addCounter(key: CounterKey, name: string, help: string): void {
    this.counters.set(key, new Counter({ name, help, registers: [this.registry] }));
  }

  private addGauge(key: GaugeKey, name: string, help: string): void {
    this.gauges.set(key, new Gauge({ name, help, registers: [this.registry] }));
  }

  private counter(name: CounterKey): Counter {
    const counter = this.counters.get(name);
    if (!counter) throw new UnknownMetricError(name);
    return counter;
  }

  private gauge(name: GaugeKey): Gauge {
    const gauge = this.gauges.get(name);
    if (!gauge) throw new UnknownMetricError(name);
    return gauge;
  }
}
