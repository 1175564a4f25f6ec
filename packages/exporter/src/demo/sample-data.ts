/**
 * Demonstration log lines, one per event type, stamped the way syslog
 * writes arpwatch entries ("Oct  9 08:03:27 host arpwatch: …").
 */

import { readFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SAMPLE_EVENTS_FILE = resolve(__dirname, "../../fixtures/sample-events.txt");

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const pad2 = (n: number) => String(n).padStart(2, "0");

/** BSD syslog timestamp in local time: day padded with a space */
export function syslogTimestamp(date: Date): string {
  const day = String(date.getDate()).padStart(2, " ");
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${MONTHS[date.getMonth()]} ${day} ${time}`;
}

/** Prefix each template line with a timestamp and host name */
export function renderSampleLines(templates: string[], date: Date, host: string): string[] {
  const stamp = syslogTimestamp(date);
  return templates.map((line) => `${stamp} ${host} ${line}`);
}

/** Non-empty lines of the bundled fixture */
export async function loadSampleTemplates(file = SAMPLE_EVENTS_FILE): Promise<string[]> {
  const text = await readFile(file, "utf8");
  return text.split("\n").map((l) => l.trim()).filter((l) => l !== "");
}
