/**
 * Shared test helpers: polling assertions and throwaway log files.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** Retry an assertion until it passes or `timeout` ms have passed */
export async function waitFor(fn: () => void | Promise<void>, timeout = 2_000): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      await fn();
      return;
    } catch (err) {
      if (Date.now() - start > timeout) throw err;
      await new Promise((r) => setTimeout(r, 10));
    }
  }
}

export const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** A fresh temp directory and a log path inside it */
export async function createTempLog(): Promise<{ dir: string; logFile: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "arpwatch-exporter-"));
  return {
    dir,
    logFile: join(dir, "arpwatch.log"),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
