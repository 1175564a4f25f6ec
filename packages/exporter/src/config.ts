/**
 * Environment configuration.
 *
 * Every setting has a default, so an empty environment yields a working
 * config for the stock arpwatch container layout.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const Config = Type.Object({
  logFile: Type.String({ minLength: 1, default: "/var/log/arpwatch.log" }),
  metricsHost: Type.String({ minLength: 1, default: "0.0.0.0" }),
  metricsPort: Type.Integer({ minimum: 0, maximum: 65535, default: 8000 }),
  waitTimeoutMs: Type.Integer({ minimum: 0, default: 60_000 }),
  waitIntervalMs: Type.Integer({ minimum: 1, default: 2_000 }),
  pollIntervalMs: Type.Integer({ minimum: 1, default: 100 }),
  maxLineBytes: Type.Integer({ minimum: 64, default: 64 * 1024 }),
  daemonName: Type.String({ pattern: "^[A-Za-z0-9_.-]+$", default: "arpwatch" }),
  metricsPrefix: Type.String({ pattern: "^[a-zA-Z_][a-zA-Z0-9_]*$", default: "arpwatch" }),
  daemonMonitorEnabled: Type.Boolean({ default: true }),
  daemonCheckIntervalMs: Type.Integer({ minimum: 1, default: 30_000 }),
  collectDefaultMetrics: Type.Boolean({ default: true }),
  logLevel: Type.Union(
    [
      Type.Literal("fatal"),
      Type.Literal("error"),
      Type.Literal("warn"),
      Type.Literal("info"),
      Type.Literal("debug"),
      Type.Literal("trace"),
      Type.Literal("silent"),
    ],
    { default: "info" },
  ),
  nodeEnv: Type.String({ default: "development" }),
});

export type Config = Static<typeof Config>;

/** Environment variable → config field */
const ENV_KEYS: Record<keyof Config, string> = {
  logFile: "LOG_FILE",
  metricsHost: "METRICS_HOST",
  metricsPort: "METRICS_PORT",
  waitTimeoutMs: "LOG_WAIT_TIMEOUT_MS",
  waitIntervalMs: "LOG_WAIT_INTERVAL_MS",
  pollIntervalMs: "POLL_INTERVAL_MS",
  maxLineBytes: "MAX_LINE_BYTES",
  daemonName: "DAEMON_NAME",
  metricsPrefix: "METRICS_PREFIX",
  daemonMonitorEnabled: "DAEMON_MONITOR_ENABLED",
  daemonCheckIntervalMs: "DAEMON_CHECK_INTERVAL_MS",
  collectDefaultMetrics: "COLLECT_DEFAULT_METRICS",
  logLevel: "LOG_LEVEL",
  nodeEnv: "NODE_ENV",
};

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(ENV_KEYS, key);
}

/**
 * Build a validated config from environment variables.
 * Empty strings count as unset. Throws ConfigError listing every bad field.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) raw[field] = value;
  }

  const value = Value.Convert(Config, Value.Default(Config, raw));
  if (!Value.Check(Config, value)) {
    const issues = [...Value.Errors(Config, value)].map((e) => {
      const field = e.path.replace(/^\//, "");
      const envKey = isConfigKey(field) ? ENV_KEYS[field] : field;
      return `${envKey}: ${e.message}`;
    });
    throw new ConfigError(issues);
  }
  return value;
}

export const isDev = (config: Pick<Config, "nodeEnv">) => config.nodeEnv !== "production";
