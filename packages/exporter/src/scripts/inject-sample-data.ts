#!/usr/bin/env tsx
/**
 * Sample data script — appends one demonstration line per event type to
 * the configured log file, so a fresh deployment shows non-zero counters.
 *
 * Usage: npm run demo:inject -w @arpwatch-exporter/exporter
 */

import { appendFile } from "node:fs/promises";
import { hostname } from "node:os";
import { loadConfig } from "../config.js";
import { loadSampleTemplates, renderSampleLines } from "../demo/sample-data.js";

async function main() {
  const config = loadConfig();
  const templates = await loadSampleTemplates();
  const lines = renderSampleLines(templates, new Date(), hostname());

  await appendFile(config.logFile, lines.map((l) => `${l}\n`).join(""));
  console.log(`Appended ${lines.length} sample event(s) to ${config.logFile}`);
}

main().catch((err) => {
  console.error("Sample data injection failed:", err);
  process.exit(1);
});
