/**
 * Event vocabulary of the arpwatch log.
 *
 * Labels double as metric keys: each one becomes an
 * `<prefix>_<label>_total` counter in the exporter's registry.
 */

/** Every label the default pattern table can produce, in priority order */
export const EVENT_LABELS = [
  "suppressed_flip_flop",
  "flip_flop",
  "changed_ethernet_address",
  "reused_old_ethernet_address",
  "new_station",
  "new_activity",
  "ethernet_mismatch",
  "ethernet_broadcast",
  "ip_broadcast",
  "bogon",
] as const;

export type EventLabel = (typeof EVENT_LABELS)[number];

/** A single classification rule */
export interface PatternRule {
  label: EventLabel;
  /**
   * Lowercase phrases that must all appear in the line, in this order.
   * A single phrase is a plain substring test.
   */
  phrases: readonly string[];
  /** Help text for the rule's counter */
  description: string;
}

/** Outcome of classifying one log line */
export type Classification =
  | { kind: "event"; label: EventLabel }
  /** Carries the daemon's log tag but matches no rule */
  | { kind: "unrecognized" }
  /** Not from the daemon, or nothing of interest */
  | { kind: "ignored" };
