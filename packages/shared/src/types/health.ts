import type { PipelineState } from "./pipeline.js";

/** Result of one daemon liveness check */
export interface DaemonCheck {
  running: boolean;
  checkedAt: Date;
  /** Set when the probe itself failed */
  error?: string;
}

/** Body of GET /health */
export interface HealthResponse {
  status: "ok" | "degraded";
  pipeline: PipelineState;
  /** null until the first check, or when the monitor is disabled */
  daemonRunning: boolean | null;
  timestamp: string;
}
