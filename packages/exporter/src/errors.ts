/**
 * Typed error classes for the exporter.
 *
 * Callers (entrypoint, tests) switch on `code` instead of parsing messages.
 */

export type ExporterErrorCode =
  | "NOT_FOUND"
  | "CONFIG"
  | "STARTUP"
  | "UNKNOWN_METRIC"
  | "PATTERN_TABLE";

export class ExporterError extends Error {
  readonly code: ExporterErrorCode;

  constructor(code: ExporterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExporterError";
    this.code = code;
  }
}

/** The log file did not appear before the wait timeout ran out */
export class LogFileNotFoundError extends ExporterError {
  readonly path: string;
  readonly waitedMs: number;

  constructor(path: string, waitedMs: number) {
    super("NOT_FOUND", `Log file ${path} not found after waiting ${waitedMs}ms`);
    this.name = "LogFileNotFoundError";
    this.path = path;
    this.waitedMs = waitedMs;
  }
}

export class ConfigError extends ExporterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration:\n${issues.map((i) => `  ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Metrics listener could not be bound */
export class StartupError extends ExporterError {
  constructor(message: string, cause?: unknown) {
    super("STARTUP", message, { cause });
    this.name = "StartupError";
  }
}

export class UnknownMetricError extends ExporterError {
  constructor(name: string) {
    super("UNKNOWN_METRIC", `Unknown metric: ${name}`);
    this.name = "UnknownMetricError";
  }
}

export class PatternTableError extends ExporterError {
  constructor(message: string) {
    super("PATTERN_TABLE", message);
    this.name = "PatternTableError";
  }
}

/** Best-effort conversion of a thrown value into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Node system error code (`ENOENT`, `EACCES`…), if any */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
