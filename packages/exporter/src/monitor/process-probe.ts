/**
 * Process table lookup for the daemon monitor.
 *
 * Kept behind a small interface so the monitor can be tested without a
 * real process table, and so a platform without /proc can plug in its own.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { errnoCode } from "../errors.js";

export interface ProcessProbe {
  /** Whether any process with this command name is alive */
  isRunning(name: string): Promise<boolean>;
}

const PID_RE = /^\d+$/;

/** Linux probe: scans `/proc/<pid>/comm` (the name `pgrep` matches on) */
export class ProcfsProbe implements ProcessProbe {
  private procRoot: string;

  constructor(procRoot = "/proc") {
    this.procRoot = procRoot;
  }

  async isRunning(name: string): Promise<boolean> {
    const entries = await readdir(this.procRoot);

    for (const entry of entries) {
      if (!PID_RE.test(entry)) continue;
      let comm: string;
      try {
        comm = await readFile(join(this.procRoot, entry, "comm"), "utf8");
      } catch (err) {
        // Process exited between readdir and readFile
        if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ESRCH") continue;
        throw err;
      }
      if (comm.trim() === name) return true;
    }
    return false;
  }
}
