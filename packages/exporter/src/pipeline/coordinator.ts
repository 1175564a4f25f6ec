/**
 * Pipeline Coordinator — wires LineFollower → Classifier → MetricRegistry
 * and owns the shutdown contract.
 *
 *   starting → waiting_for_file → running → draining → stopped
 *
 * Only a failure to find the log file ends the pipeline with an error;
 * everything that happens once lines are flowing is logged and skipped.
 * Shutdown is cooperative through the AbortSignal passed to `run()`.
 */

import type { PipelineState, PipelineStats } from "@arpwatch-exporter/shared";
import { LineFollower, type LineFollowerOptions } from "../follower/index.js";
import type { Classifier } from "../patterns/classifier.js";
import type { MetricRegistry } from "../metrics/metric-registry.js";
import { silentLogger, type Logger } from "../logger.js";

export interface PipelineCoordinatorOptions {
  /** Passed through to LineFollower.open (logger is supplied here) */
  follower?: Omit<LineFollowerOptions, "logger">;
  /** Called on every state transition */
  onStateChange?: (prev: PipelineState, next: PipelineState) => void;
  logger?: Logger;
}

export class PipelineCoordinator {
  private logFile: string;
  private classifier: Classifier;
  private registry: MetricRegistry;
  private followerOptions: Omit<LineFollowerOptions, "logger">;
  private onStateChange?: PipelineCoordinatorOptions["onStateChange"];
  private log: Logger;

  private current: PipelineState = "starting";
  private counts: PipelineStats = { linesRead: 0, eventsMatched: 0, unrecognized: 0 };

  constructor(
    logFile: string,
    classifier: Classifier,
    registry: MetricRegistry,
    options?: PipelineCoordinatorOptions,
  ) {
    this.logFile = logFile;
    this.classifier = classifier;
    this.registry = registry;
    this.followerOptions = options?.follower ?? {};
    this.onStateChange = options?.onStateChange;
    this.log = options?.logger ?? silentLogger();
  }

  get state(): PipelineState {
    return this.current;
  }

  get stats(): PipelineStats {
    return { ...this.counts };
  }

  /**
   * Run until `signal` aborts. Resolves after a graceful stop (including
   * an abort while still waiting for the file); rejects if the log file
   * never appears.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.current !== "starting") {
      throw new Error(`Pipeline cannot start from state "${this.current}"`);
    }
    this.log.info({ logFile: this.logFile }, "Pipeline starting");

    this.transition("waiting_for_file");
    let follower: LineFollower;
    try {
      follower = await LineFollower.open(
        this.logFile,
        { ...this.followerOptions, logger: this.log.child({ component: "follower" }) },
        signal,
      );
    } catch (err) {
      this.transition("stopped");
      if (signal.aborted) {
        this.log.info("Shutdown requested while waiting for log file");
        return;
      }
      throw err;
    }

    this.transition("running");
    try {
      for await (const line of follower.lines(signal)) {
        this.process(line);
      }
    } finally {
      this.transition("draining");
      await follower.close();
      this.transition("stopped");
      this.log.info(this.counts, "Pipeline stopped");
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private process(line: string): void {
    this.counts.linesRead++;
    try {
      const result = this.classifier.classify(line);
      switch (result.kind) {
        case "event":
          this.registry.recordEvent(result.label);
          this.counts.eventsMatched++;
          this.log.debug({ label: result.label }, "Event recorded");
          break;
        case "unrecognized":
          this.registry.increment("unrecognized_lines");
          this.counts.unrecognized++;
          break;
        case "ignored":
          break;
      }
    } catch (err) {
      this.log.error({ err, line }, "Failed to process line");
    }
  }

  private transition(next: PipelineState): void {
    const prev = this.current;
    if (prev === next) return;
    this.current = next;
    this.log.debug({ from: prev, to: next }, "Pipeline state change");
    this.onStateChange?.(prev, next);
  }
}
