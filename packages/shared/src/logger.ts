/**
 * Pino Logger Factory
 *
 * Structured logging via pino, with typed loggers and context binding.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
}

function resolveLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === candidate) ?? "info";
}

/**
 * Create a pino logger. `LOG_LEVEL` and `LOG_PRETTY=1` (or `NODE_ENV=development`)
 * supply the defaults.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? resolveLevel(process.env.LOG_LEVEL);
  const pretty = config.pretty ?? (process.env.LOG_PRETTY === "1" || process.env.NODE_ENV === "development");
  const options: LoggerOptions = {
    level,
    base: config.base ?? { service: "murmur" },
  };

  if (pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/**
 * Logger surface used across packages
 */
export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createRuntimeLogger(config?: LoggerConfig): RuntimeLogger {
  return wrapLogger(createLogger(config));
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

let defaultLogger: RuntimeLogger | null = null;

/**
 * Get or create the default runtime logger
 */
export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return defaultLogger;
}
