import { pino, type Logger } from "pino";
import { isDev, type Config } from "./config.js";

export type { Logger };

/**
 * Root logger shared by the pipeline and Fastify.
 * Pretty-printed in development, structured JSON otherwise.
 */
export function createLogger(config: Pick<Config, "logLevel" | "nodeEnv">): Logger {
  if (isDev(config)) {
    return pino({
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }
  return pino({ level: config.logLevel });
}

/** Logger that drops everything, for tests and library use */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
