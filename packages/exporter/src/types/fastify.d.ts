import "fastify";
import type { MetricRegistry } from "../metrics/metric-registry.js";
import type { PipelineCoordinator } from "../pipeline/coordinator.js";
import type { DaemonMonitor } from "../monitor/daemon-monitor.js";

declare module "fastify" {
  interface FastifyInstance {
    registry: MetricRegistry;
    coordinator: PipelineCoordinator;
    daemonMonitor: DaemonMonitor | null;
  }
}
