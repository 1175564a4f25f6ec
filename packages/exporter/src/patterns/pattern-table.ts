/**
 * Pattern Table — the fixed, ordered rule set used to classify log lines.
 *
 * Order is priority: when a line satisfies more than one rule, only the
 * first one counts. Compound rules therefore sit above the simpler rules
 * they overlap with ("suppressed … flip flop" before "flip flop").
 */

import type { EventLabel, PatternRule } from "@arpwatch-exporter/shared";
import { PatternTableError } from "../errors.js";

export const DEFAULT_RULES: readonly PatternRule[] = [
  {
    label: "suppressed_flip_flop",
    phrases: ["suppressed", "flip flop"],
    description: "Flip flop reports the daemon suppressed",
  },
  {
    label: "flip_flop",
    phrases: ["flip flop"],
    description: "Stations switching between two ethernet addresses",
  },
  {
    label: "changed_ethernet_address",
    phrases: ["changed ethernet address"],
    description: "IP addresses seen with a new ethernet address",
  },
  {
    label: "reused_old_ethernet_address",
    phrases: ["reused old ethernet address"],
    description: "IP addresses switching back to a previously seen ethernet address",
  },
  {
    label: "new_station",
    phrases: ["new station"],
    description: "Total new stations detected",
  },
  {
    label: "new_activity",
    phrases: ["new activity"],
    description: "Stations active again after six months or more",
  },
  {
    label: "ethernet_mismatch",
    phrases: ["ethernet mismatch"],
    description: "Source ethernet address differing from the ARP payload",
  },
  {
    label: "ethernet_broadcast",
    phrases: ["ethernet broadcast"],
    description: "Stations using a broadcast ethernet address",
  },
  {
    label: "ip_broadcast",
    phrases: ["ip broadcast"],
    description: "Stations using a broadcast IP address",
  },
  {
    label: "bogon",
    phrases: ["bogon"],
    description: "Source IP addresses outside the local subnet",
  },
];

/** Escape a string for literal use inside a RegExp */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** True if every phrase occurs in `haystack`, each after the previous one */
function containsInOrder(haystack: string, phrases: readonly string[]): boolean {
  let from = 0;
  for (const phrase of phrases) {
    const at = haystack.indexOf(phrase, from);
    if (at === -1) return false;
    from = at + phrase.length;
  }
  return true;
}

export class PatternTable {
  readonly rules: readonly PatternRule[];
  private daemonTag: RegExp;

  constructor(rules: readonly PatternRule[] = DEFAULT_RULES, daemonName = "arpwatch") {
    if (rules.length === 0) {
      throw new PatternTableError("Pattern table needs at least one rule");
    }

    const seen = new Set<EventLabel>();
    for (const rule of rules) {
      if (seen.has(rule.label)) {
        throw new PatternTableError(`Duplicate pattern label: ${rule.label}`);
      }
      if (rule.phrases.length === 0 || rule.phrases.some((p) => p.trim() === "")) {
        throw new PatternTableError(`Rule ${rule.label} has an empty phrase`);
      }
      seen.add(rule.label);
    }

    // Stored lowercased and frozen: no rule changes after startup
    this.rules = Object.freeze(
      rules.map((rule) =>
        Object.freeze({
          ...rule,
          phrases: Object.freeze(rule.phrases.map((p) => p.toLowerCase())),
        }),
      ),
    );

    // syslog tag, e.g. "arpwatch:" or "arpwatch[1234]:"
    this.daemonTag = new RegExp(`\\b${escapeRegExp(daemonName)}(?:\\[\\d+\\])?:`, "i");
  }

  /** Labels in priority order */
  get labels(): EventLabel[] {
    return this.rules.map((r) => r.label);
  }

  /** First rule matching the line, case-insensitively */
  match(line: string): PatternRule | undefined {
    const lower = line.toLowerCase();
    return this.rules.find((rule) => containsInOrder(lower, rule.phrases));
  }

  /** Whether the line carries the monitored daemon's log tag */
  hasDaemonPrefix(line: string): boolean {
    return this.daemonTag.test(line);
  }
}
