import { describe, it, expect } from "vitest";
import { MetricRegistry } from "./metric-registry.js";
import { parseExposition } from "./exposition-parser.js";
import { DEFAULT_RULES } from "../patterns/pattern-table.js";
import { UnknownMetricError } from "../errors.js";

const NOW_MS = 1_700_000_000_000;

function createRegistry(prefix?: string) {
  return new MetricRegistry(DEFAULT_RULES, { prefix, now: () => NOW_MS });
}

describe("MetricRegistry", () => {
  it("exposes one counter per rule plus the fixed aggregates", () => {
    const registry = createRegistry();
    expect(registry.keys).toHaveLength(DEFAULT_RULES.length + 4);
    expect(registry.keys).toContain("total_events");
    expect(registry.keys).toContain("unrecognized_lines");
    expect(registry.keys).toContain("last_activity_timestamp");
    expect(registry.keys).toContain("daemon_up");
  });

  it("starts every metric at zero", async () => {
    const registry = createRegistry();
    for (const key of registry.keys) {
      expect(await registry.read(key)).toBe(0);
    }
  });

  it("records an event into the label counter, the total and the timestamp", async () => {
    const registry = createRegistry();
    registry.recordEvent("new_station");
    registry.recordEvent("new_station");
    registry.recordEvent("bogon");

    expect(await registry.read("new_station")).toBe(2);
    expect(await registry.read("bogon")).toBe(1);
    expect(await registry.read("total_events")).toBe(3);
    expect(await registry.read("last_activity_timestamp")).toBe(1_700_000_000);
  });

  it("increments a single counter without touching the total", async () => {
    const registry = createRegistry();
    registry.increment("unrecognized_lines");
    expect(await registry.read("unrecognized_lines")).toBe(1);
    expect(await registry.read("total_events")).toBe(0);
  });

  it("sets gauges", async () => {
    const registry = createRegistry();
    registry.setGauge("daemon_up", 1);
    expect(await registry.read("daemon_up")).toBe(1);
    registry.setGauge("daemon_up", 0);
    expect(await registry.read("daemon_up")).toBe(0);
  });

  it("refuses metrics that were not registered at startup", async () => {
    const registry = new MetricRegistry([DEFAULT_RULES[4]]);
    expect(() => registry.recordEvent("bogon")).toThrow(UnknownMetricError);
    await expect(registry.read("bogon")).rejects.toThrow(UnknownMetricError);
    expect(await registry.read("total_events")).toBe(0);
  });

  it("keeps every label counter at or below the total", async () => {
    const registry = createRegistry();
    registry.recordEvent("flip_flop");
    registry.recordEvent("new_station");
    registry.increment("unrecognized_lines");

    const total = await registry.read("total_events");
    expect(total).toBe(2);
    for (const rule of DEFAULT_RULES) {
      expect(await registry.read(rule.label)).toBeLessThanOrEqual(total);
    }
  });

  it("leaves out the process health gauge when asked to", async () => {
    const registry = new MetricRegistry(DEFAULT_RULES, { processHealth: false });
    expect(registry.keys).toHaveLength(DEFAULT_RULES.length + 3);
    expect(registry.keys).not.toContain("daemon_up");
    expect(() => registry.setGauge("daemon_up", 1)).toThrow(UnknownMetricError);

    const samples = parseExposition(await registry.renderSnapshot());
    expect(samples.has("arpwatch_process_health")).toBe(false);
    expect(samples.get("arpwatch_events_total")).toBe(0);
  });

  it("renders the text exposition format", async () => {
    const registry = createRegistry();
    registry.recordEvent("new_station");

    const lines = (await registry.renderSnapshot()).split("\n");
    expect(lines).toContain("# HELP arpwatch_new_station_total Total new stations detected");
    expect(lines).toContain("# TYPE arpwatch_new_station_total counter");
    expect(lines).toContain("arpwatch_new_station_total 1");
    expect(lines).toContain("arpwatch_events_total 1");
    expect(lines).toContain("# TYPE arpwatch_last_activity_timestamp_seconds gauge");
    expect(lines).toContain("arpwatch_last_activity_timestamp_seconds 1700000000");
    expect(lines).toContain("arpwatch_process_health 0");
  });

  it("renders identical snapshots when nothing changed", async () => {
    const registry = createRegistry();
    registry.recordEvent("flip_flop");
    const first = await registry.renderSnapshot();
    const second = await registry.renderSnapshot();
    expect(second).toBe(first);
  });

  it("applies a custom prefix", async () => {
    const registry = createRegistry("netmon");
    registry.recordEvent("ip_broadcast");

    const samples = parseExposition(await registry.renderSnapshot());
    expect(samples.get("netmon_ip_broadcast_total")).toBe(1);
    expect(samples.get("netmon_events_total")).toBe(1);
    expect(samples.has("arpwatch_events_total")).toBe(false);
  });

  it("optionally includes Node.js process metrics", async () => {
    const registry = new MetricRegistry(DEFAULT_RULES, { collectDefaultMetrics: true });
    const samples = parseExposition(await registry.renderSnapshot());
    expect(samples.has("process_cpu_user_seconds_total")).toBe(true);
  });

  it("keeps separate instances independent", async () => {
    const a = createRegistry();
    const b = createRegistry();
    a.recordEvent("bogon");
    expect(await a.read("bogon")).toBe(1);
    expect(await b.read("bogon")).toBe(0);
  });
});
