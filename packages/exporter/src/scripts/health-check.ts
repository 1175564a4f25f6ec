#!/usr/bin/env tsx
/**
 * Container health check — fails when the metrics endpoint does not
 * answer. A stopped daemon is only reported, since the exporter keeps
 * serving counters without it.
 *
 * Usage: tsx src/scripts/health-check.ts [url]
 */

import { loadConfig } from "../config.js";
import { localMetricsUrl, scrapeMetrics } from "../metrics/index.js";

async function main() {
  const config = loadConfig();
  const url = process.argv[2] ?? localMetricsUrl(config.metricsHost, config.metricsPort);

  const samples = await scrapeMetrics(url);
  const health = samples.get(`${config.metricsPrefix}_process_health`);
  if (health === 0) {
    console.warn(`Warning: ${config.daemonName} process not detected`);
  }
  console.log("Health check passed: metrics endpoint responding");
}

main().catch((err) => {
  console.error("Health check failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
