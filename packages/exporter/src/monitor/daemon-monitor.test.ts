import { describe, it, expect, vi, afterEach } from "vitest";
import { DaemonMonitor } from "./daemon-monitor.js";
import type { ProcessProbe } from "./process-probe.js";
import { MetricRegistry } from "../metrics/metric-registry.js";
import { DEFAULT_RULES } from "../patterns/pattern-table.js";
import { waitFor } from "../test/helpers.js";

// ---------------------------------------------------------------------------
// Fake probe
// ---------------------------------------------------------------------------

function createProbe(isRunning: ProcessProbe["isRunning"]): ProcessProbe {
  return { isRunning: vi.fn(isRunning) };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let monitor: DaemonMonitor;

afterEach(() => {
  monitor?.stop();
});

describe("DaemonMonitor", () => {
  it("starts and stops the polling loop", () => {
    const registry = new MetricRegistry(DEFAULT_RULES);
    monitor = new DaemonMonitor("arpwatch", createProbe(async () => true), registry, { intervalMs: 100 });

    expect(monitor.isRunning).toBe(false);
    monitor.start();
    expect(monitor.isRunning).toBe(true);
    monitor.stop();
    expect(monitor.isRunning).toBe(false);
  });

  it("does not start twice", async () => {
    const probe = createProbe(async () => true);
    monitor = new DaemonMonitor("arpwatch", probe, new MetricRegistry(DEFAULT_RULES), {
      intervalMs: 60_000,
    });

    monitor.start();
    monitor.start(); // no-op
    await waitFor(() => expect(monitor.lastCheck).not.toBeNull());
    expect(probe.isRunning).toHaveBeenCalledTimes(1);
  });

  it("checks immediately on start and publishes the gauge", async () => {
    const registry = new MetricRegistry(DEFAULT_RULES);
    const probe = createProbe(async () => true);
    monitor = new DaemonMonitor("arpwatch", probe, registry, { intervalMs: 60_000 });

    monitor.start();
    await waitFor(() => expect(monitor.lastCheck?.running).toBe(true));

    expect(probe.isRunning).toHaveBeenCalledWith("arpwatch");
    expect(await registry.read("daemon_up")).toBe(1);
    expect(monitor.lastCheck?.checkedAt).toBeInstanceOf(Date);
  });

  it("polls again on every interval", async () => {
    const probe = createProbe(async () => false);
    monitor = new DaemonMonitor("arpwatch", probe, new MetricRegistry(DEFAULT_RULES), {
      intervalMs: 20,
    });

    monitor.start();
    await waitFor(() => expect(vi.mocked(probe.isRunning).mock.calls.length).toBeGreaterThanOrEqual(3));
  });

  it("reports a stopped daemon as 0", async () => {
    const registry = new MetricRegistry(DEFAULT_RULES);
    registry.setGauge("daemon_up", 1);
    monitor = new DaemonMonitor("arpwatch", createProbe(async () => false), registry);

    const result = await monitor.check();
    expect(result.running).toBe(false);
    expect(await registry.read("daemon_up")).toBe(0);
  });

  it("treats a failing probe as not running", async () => {
    const registry = new MetricRegistry(DEFAULT_RULES);
    const probe = createProbe(async () => {
      throw new Error("EACCES: permission denied, scandir '/proc'");
    });
    monitor = new DaemonMonitor("arpwatch", probe, registry);

    const result = await monitor.check();
    expect(result.running).toBe(false);
    expect(result.error).toBe("EACCES: permission denied, scandir '/proc'");
    expect(await registry.read("daemon_up")).toBe(0);
  });

  it("calls onStatusChange when the daemon goes away", async () => {
    const onChange = vi.fn();
    let calls = 0;
    const probe = createProbe(async () => {
      calls++;
      // First check: running, second check: gone
      return calls <= 1;
    });
    monitor = new DaemonMonitor("arpwatch", probe, new MetricRegistry(DEFAULT_RULES), {
      onStatusChange: onChange,
    });

    await monitor.check();
    expect(onChange).not.toHaveBeenCalled();
    await monitor.check();
    expect(onChange).toHaveBeenCalledWith(true, false);
  });
});
