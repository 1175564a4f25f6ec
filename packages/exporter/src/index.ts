/**
 * arpwatch exporter — entrypoint.
 *
 * Follows the arpwatch log, classifies each new line and serves the
 * resulting counters on GET /metrics. Exit codes: 0 after a graceful
 * shutdown (SIGINT/SIGTERM), 1 on a fatal startup or I/O failure.
 */

import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ExporterError, StartupError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { MetricRegistry } from "./metrics/index.js";
import { DaemonMonitor, ProcfsProbe } from "./monitor/index.js";
import { Classifier, DEFAULT_RULES, PatternTable } from "./patterns/index.js";
import { PipelineCoordinator } from "./pipeline/coordinator.js";

let logger: Logger | undefined;

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);
  logger = log;

  const table = new PatternTable(DEFAULT_RULES, config.daemonName);
  const registry = new MetricRegistry(table.rules, {
    prefix: config.metricsPrefix,
    collectDefaultMetrics: config.collectDefaultMetrics,
    processHealth: config.daemonMonitorEnabled,
  });
  const classifier = new Classifier(table, log.child({ component: "classifier" }));
  const coordinator = new PipelineCoordinator(config.logFile, classifier, registry, {
    follower: {
      pollIntervalMs: config.pollIntervalMs,
      waitTimeoutMs: config.waitTimeoutMs,
      waitIntervalMs: config.waitIntervalMs,
      maxLineBytes: config.maxLineBytes,
    },
    logger: log.child({ component: "pipeline" }),
  });
  const daemonMonitor = config.daemonMonitorEnabled
    ? new DaemonMonitor(config.daemonName, new ProcfsProbe(), registry, {
        intervalMs: config.daemonCheckIntervalMs,
        logger: log.child({ component: "daemon-monitor" }),
      })
    : null;

  const app = await buildApp({ registry, coordinator, daemonMonitor, logger: log });

  const controller = new AbortController();
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      log.info({ signal }, "Shutdown requested");
      controller.abort();
    });
  }

  try {
    await app.listen({ port: config.metricsPort, host: config.metricsHost });
  } catch (err) {
    throw new StartupError(
      `Cannot listen on ${config.metricsHost}:${config.metricsPort}`,
      err,
    );
  }
  log.info(
    { host: config.metricsHost, port: config.metricsPort, logFile: config.logFile },
    "Metrics endpoint listening",
  );

  try {
    await coordinator.run(controller.signal);
  } finally {
    await app.close();
  }
}

main().then(
  () => {
    logger?.info("Exporter stopped");
    process.exit(0);
  },
  (err: unknown) => {
    const code = err instanceof ExporterError ? err.code : "UNEXPECTED";
    if (logger) {
      logger.fatal({ err, code }, "Exporter failed");
    } else {
      console.error("Exporter failed:", err);
    }
    process.exit(1);
  },
);
