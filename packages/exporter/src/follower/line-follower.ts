/**
 * Line Follower — tails a single append-only log file.
 *
 * Polling design: each `next()` call checks the path for rotation, reads
 * whatever has been appended since the last call and hands back one
 * complete line at a time. When nothing is available the caller gets
 * `blocked` and is expected to wait `pollIntervalMs` before asking again
 * (`lines()` does this for you).
 *
 * Rotation handling:
 *  - path shrank below our offset    → truncated, re-read from 0
 *  - path now has another dev/inode  → replaced: drain the old handle,
 *                                      then switch to the new file at 0
 *  - path missing (moved, not yet recreated) → keep reading the old handle
 *
 * A truncation followed by a rewrite past the old offset within one poll
 * interval is indistinguishable from an append and goes unnoticed.
 */

import type { Stats } from "node:fs";
import { open, stat, type FileHandle } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import type { FollowResult, LogPosition, RotationReason } from "@arpwatch-exporter/shared";
import { LogFileNotFoundError, errnoCode, toError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export interface LineFollowerOptions {
  /** Wait between reads when no complete line is available (default: 100) */
  pollIntervalMs?: number;
  /** How long `open()` waits for the file to appear (default: 60000) */
  waitTimeoutMs?: number;
  /** Interval between existence checks while waiting (default: 2000) */
  waitIntervalMs?: number;
  /** Longest line kept; the rest of an oversized line is dropped (default: 65536) */
  maxLineBytes?: number;
  /** Start at the beginning instead of the end of the file (default: false) */
  fromStart?: boolean;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_WAIT_TIMEOUT_MS = 60_000;
const DEFAULT_WAIT_INTERVAL_MS = 2_000;
const DEFAULT_MAX_LINE_BYTES = 64 * 1024;
const CHUNK_BYTES = 64 * 1024;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const EMPTY = Buffer.alloc(0);

/** Decode one line, dropping a trailing CR. Invalid UTF-8 becomes U+FFFD. */
function decodeLine(bytes: Buffer): string {
  const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN
    ? bytes.length - 1
    : bytes.length;
  return bytes.toString("utf8", 0, end);
}

/**
 * Wait until `path` exists as a regular file.
 * Throws LogFileNotFoundError once `timeoutMs` has passed without it.
 */
export async function waitForFile(
  path: string,
  timeoutMs: number,
  intervalMs: number,
  log: Logger,
  signal?: AbortSignal,
): Promise<void> {
  const started = Date.now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const stats = await stat(path);
      if (stats.isFile()) return;
      log.warn({ path, attempt }, "Log path exists but is not a regular file");
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        log.warn({ path, attempt, err }, "Cannot stat log file");
      }
    }

    const elapsed = Date.now() - started;
    if (elapsed >= timeoutMs) {
      throw new LogFileNotFoundError(path, elapsed);
    }
    log.info(
      { path, attempt, elapsedMs: elapsed, timeoutMs },
      "Waiting for log file to appear",
    );
    await sleep(Math.min(intervalMs, timeoutMs - elapsed), undefined, { signal });
  }
}

export class LineFollower {
  readonly path: string;
  readonly pollIntervalMs: number;
  private maxLineBytes: number;
  private log: Logger;

  private handle: FileHandle;
  private dev: number;
  private ino: number;
  private offset: number;
  private closed = false;

  /** Bytes of the current, not yet terminated line */
  private pending: Buffer = EMPTY;
  /** Set after an oversized line was cut, until its newline arrives */
  private discarding = false;
  /** Complete lines waiting to be handed out */
  private queue: string[] = [];
  private chunk = Buffer.alloc(CHUNK_BYTES);

  private constructor(
    path: string,
    handle: FileHandle,
    position: LogPosition,
    options: LineFollowerOptions,
  ) {
    this.path = path;
    this.handle = handle;
    this.dev = position.dev;
    this.ino = position.ino;
    this.offset = position.offset;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
    this.log = options.logger ?? silentLogger();
  }

  /**
   * Wait for `path` to exist, open it and position at end of file
   * (or at 0 with `fromStart`).
   */
  static async open(
    path: string,
    options: LineFollowerOptions = {},
    signal?: AbortSignal,
  ): Promise<LineFollower> {
    const log = options.logger ?? silentLogger();
    await waitForFile(
      path,
      options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS,
      options.waitIntervalMs ?? DEFAULT_WAIT_INTERVAL_MS,
      log,
      signal,
    );

    const handle = await open(path, "r");
    try {
      const stats = await handle.stat();
      const offset = options.fromStart ? 0 : stats.size;
      log.info({ path, offset, ino: stats.ino }, "Following log file");
      return new LineFollower(path, handle, { offset, dev: stats.dev, ino: stats.ino }, options);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  /** Current read position and file identity */
  get position(): LogPosition {
    return { offset: this.offset, dev: this.dev, ino: this.ino };
  }

  /**
   * One read attempt. Never throws: I/O failures come back as
   * `{ kind: "error" }` so the caller can log and retry.
   */
  async next(): Promise<FollowResult> {
    const queued = this.queue.shift();
    if (queued !== undefined) return { kind: "line", line: queued };
    if (this.closed) return { kind: "error", error: new Error("Follower is closed") };

    try {
      const rotation = await this.checkRotation();
      if (rotation) return { kind: "rotated", reason: rotation };

      for (;;) {
        const bytesRead = await this.readChunk();
        const line = this.queue.shift();
        if (line !== undefined) return { kind: "line", line };
        // A short read means we are at end of file
        if (bytesRead < this.chunk.length) return { kind: "blocked" };
      }
    } catch (err) {
      return { kind: "error", error: toError(err) };
    }
  }

  /**
   * Lazy, endless sequence of lines. Sleeps between empty polls, logs
   * rotations and read errors, and returns once `signal` aborts.
   */
  async *lines(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    while (!signal?.aborted) {
      const result = await this.next();
      switch (result.kind) {
        case "line":
          yield result.line;
          break;
        case "rotated":
          this.log.info({ path: this.path, reason: result.reason }, "Log file rotated, reading from start");
          break;
        case "error":
          this.log.warn({ path: this.path, err: result.error }, "Read error, retrying");
          if (!(await this.pause(signal))) return;
          break;
        case "blocked":
          if (!(await this.pause(signal))) return;
          break;
      }
    }
  }

  /** Release the file handle. Safe to call twice. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Sleep one poll interval; false if aborted meanwhile */
  private async pause(signal?: AbortSignal): Promise<boolean> {
    try {
      await sleep(this.pollIntervalMs, undefined, { signal });
      return true;
    } catch (err) {
      if (signal?.aborted) return false;
      throw err;
    }
  }

  private async checkRotation(): Promise<RotationReason | null> {
    let current: Stats;
    try {
      current = await stat(this.path);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }

    if (current.ino !== this.ino || current.dev !== this.dev) {
      await this.reopen();
      return "replaced";
    }
    if (current.size < this.offset) {
      this.offset = 0;
      this.resetLineState();
      return "truncated";
    }
    return null;
  }

  /**
   * Switch to the file now at `path`. The new file is opened first, so a
   * failure leaves the old handle in place for the next attempt.
   */
  private async reopen(): Promise<void> {
    const next = await open(this.path, "r");
    let stats: Stats;
    try {
      stats = await next.stat();
    } catch (err) {
      await next.close();
      throw err;
    }

    // Lines written to the old file just before it was moved
    while ((await this.readChunk()) === this.chunk.length) {
      // keep draining
    }
    if (this.pending.length > 0 && !this.discarding) {
      this.queue.push(decodeLine(this.pending));
    }

    const previous = this.handle;
    this.handle = next;
    this.dev = stats.dev;
    this.ino = stats.ino;
    this.offset = 0;
    this.resetLineState();
    await previous.close();
  }

  private resetLineState(): void {
    this.pending = EMPTY;
    this.discarding = false;
  }

  private async readChunk(): Promise<number> {
    const { bytesRead } = await this.handle.read(this.chunk, 0, this.chunk.length, this.offset);
    if (bytesRead > 0) {
      this.offset += bytesRead;
      this.absorb(this.chunk.subarray(0, bytesRead));
    }
    return bytesRead;
  }

  /** Split freshly read bytes into complete lines */
  private absorb(data: Buffer): void {
    // Copy: `data` aliases the reusable read buffer
    let buf = this.pending.length > 0 ? Buffer.concat([this.pending, data]) : Buffer.from(data);

    let newline = buf.indexOf(NEWLINE);
    while (newline !== -1) {
      if (this.discarding) {
        this.discarding = false;
      } else {
        this.queue.push(decodeLine(buf.subarray(0, Math.min(newline, this.maxLineBytes))));
      }
      buf = buf.subarray(newline + 1);
      newline = buf.indexOf(NEWLINE);
    }

    if (this.discarding) {
      this.pending = EMPTY;
      return;
    }
    if (buf.length >= this.maxLineBytes) {
      this.log.warn(
        { path: this.path, maxLineBytes: this.maxLineBytes },
        "Line exceeds maximum length, truncating",
      );
      this.queue.push(decodeLine(buf.subarray(0, this.maxLineBytes)));
      this.discarding = true;
      this.pending = EMPTY;
      return;
    }
    this.pending = buf;
  }
}
