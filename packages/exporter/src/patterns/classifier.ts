import type { Classification, EventLabel } from "@arpwatch-exporter/shared";
import type { Logger } from "../logger.js";
import type { PatternTable } from "./pattern-table.js";

/**
 * Maps one raw log line to at most one event label.
 * Stateless apart from the table it was built with.
 */
export class Classifier {
  private table: PatternTable;
  private log?: Logger;

  constructor(table: PatternTable, log?: Logger) {
    this.table = table;
    this.log = log;
  }

  classify(line: string): Classification {
    const rule = this.table.match(line);
    if (rule) return { kind: "event", label: rule.label };

    if (this.table.hasDaemonPrefix(line)) {
      this.log?.debug({ line }, "Unrecognized daemon line");
      return { kind: "unrecognized" };
    }
    return { kind: "ignored" };
  }

  /** Matched label, or null when no rule fires */
  label(line: string): EventLabel | null {
    const result = this.classify(line);
    return result.kind === "event" ? result.label : null;
  }
}
