/**
 * Types for the follow → classify → publish pipeline.
 *
 * These stay free of Node and framework imports so both the exporter
 * and any tooling around it can share them.
 */

/** Lifecycle of the pipeline coordinator */
export type PipelineState =
  | "starting"
  | "waiting_for_file"
  | "running"
  | "draining"
  | "stopped";

/**
 * Read position within the followed file.
 * `offset` only grows while `dev`/`ino` stay the same; it goes back
 * to 0 when the file is truncated or replaced.
 */
export interface LogPosition {
  offset: number;
  dev: number;
  ino: number;
}

export type RotationReason = "truncated" | "replaced";

/** Result of a single follower read attempt */
export type FollowResult =
  | { kind: "line"; line: string }
  | { kind: "blocked" }
  | { kind: "rotated"; reason: RotationReason }
  | { kind: "error"; error: Error };

/** Counts kept by the coordinator for the health endpoint */
export interface PipelineStats {
  linesRead: number;
  eventsMatched: number;
  unrecognized: number;
}
