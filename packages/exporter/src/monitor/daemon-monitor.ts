/**
 * Daemon Monitor — periodically checks whether the monitored daemon is
 * running and reports it as the `daemon_up` gauge.
 *
 * Runs on its own timer and only touches the registry through its public
 * gauge interface; the pipeline never waits on it.
 */

import type { DaemonCheck } from "@arpwatch-exporter/shared";
import type { MetricRegistry } from "../metrics/metric-registry.js";
import { toError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ProcessProbe } from "./process-probe.js";

export interface DaemonMonitorOptions {
  /** Polling interval in milliseconds (default: 30000 = 30s) */
  intervalMs?: number;
  /** Called whenever the running state flips */
  onStatusChange?: (prev: boolean, next: boolean) => void;
  logger?: Logger;
}

const DEFAULT_INTERVAL_MS = 30_000;

export class DaemonMonitor {
  private daemonName: string;
  private probe: ProcessProbe;
  private registry: MetricRegistry;
  private intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private onStatusChange?: DaemonMonitorOptions["onStatusChange"];
  private log: Logger;

  private last: DaemonCheck | null = null;
  /** Guards against overlapping checks when the probe is slow */
  private checking = false;

  constructor(
    daemonName: string,
    probe: ProcessProbe,
    registry: MetricRegistry,
    options?: DaemonMonitorOptions,
  ) {
    this.daemonName = daemonName;
    this.probe = probe;
    this.registry = registry;
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.onStatusChange = options?.onStatusChange;
    this.log = options?.logger ?? silentLogger();
  }

  /** Start the check loop */
  start(): void {
    if (this.timer) return; // already running
    this.timer = setInterval(() => void this.check(), this.intervalMs);
    this.timer.unref();
    // Run an initial check immediately
    void this.check();
  }

  /** Stop the check loop */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Whether the monitor is currently running */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Result of the most recent check (null before the first one) */
  get lastCheck(): DaemonCheck | null {
    return this.last;
  }

  /** Probe once and publish the result. Never rejects. */
  async check(): Promise<DaemonCheck> {
    if (this.checking && this.last) return this.last;
    this.checking = true;

    let result: DaemonCheck;
    try {
      const running = await this.probe.isRunning(this.daemonName);
      result = { running, checkedAt: new Date() };
    } catch (err) {
      const error = toError(err);
      this.log.warn({ err: error, daemon: this.daemonName }, "Daemon process check failed");
      result = { running: false, checkedAt: new Date(), error: error.message };
    } finally {
      this.checking = false;
    }

    const prev = this.last;
    this.last = result;
    this.registry.setGauge("daemon_up", result.running ? 1 : 0);

    if (prev === null) {
      this.log.info({ daemon: this.daemonName, running: result.running }, "Daemon process status");
    } else if (prev.running !== result.running) {
      this.log.warn(
        { daemon: this.daemonName, running: result.running },
        result.running ? "Daemon process detected" : "Daemon process not detected",
      );
      this.onStatusChange?.(prev.running, result.running);
    }
    return result;
  }
}
