/**
 * Monitor Module
 *
 * Liveness of the daemon that writes the followed log. Reports into the
 * metric registry; independent of the pipeline and the web framework.
 */

export { DaemonMonitor } from "./daemon-monitor.js";
export type { DaemonMonitorOptions } from "./daemon-monitor.js";
export { ProcfsProbe } from "./process-probe.js";
export type { ProcessProbe } from "./process-probe.js";
