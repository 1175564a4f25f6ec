import Fastify, {
  type FastifyBaseLogger,
  type FastifyServerOptions,
  type FastifyError,
} from "fastify";

import type { MetricRegistry } from "./metrics/metric-registry.js";
import type { PipelineCoordinator } from "./pipeline/coordinator.js";
import type { DaemonMonitor } from "./monitor/daemon-monitor.js";
import { silentLogger, type Logger } from "./logger.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

export interface BuildAppOptions
  extends Omit<FastifyServerOptions, "logger" | "loggerInstance"> {
  registry: MetricRegistry;
  coordinator: PipelineCoordinator;
  /** Started and stopped with the server when given */
  daemonMonitor?: DaemonMonitor | null;
  /** Shared root logger (default: silent) */
  logger?: Logger;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { registry, coordinator, daemonMonitor, logger, ...fastifyOpts } = opts;

  const loggerInstance: FastifyBaseLogger = logger ?? silentLogger();

  const app = Fastify({
    ...fastifyOpts,
    loggerInstance,
    // Scrapers hit this every few seconds; keep it out of the info log
    disableRequestLogging: fastifyOpts.disableRequestLogging ?? true,
  });

  app.decorate("registry", registry);
  app.decorate("coordinator", coordinator);
  app.decorate("daemonMonitor", daemonMonitor ?? null);

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors: log full details, return generic message
    request.log.error({ err: error }, "Unhandled request error");
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  app.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({ error: "Not found" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes, { prefix: "/health" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------
  app.addHook("onReady", async () => {
    app.daemonMonitor?.start();
  });

  app.addHook("onClose", async () => {
    app.daemonMonitor?.stop();
  });

  return app;
}
