/**
 * @snaplink/logger - Structured Logging Package
 *
 * Provides consistent structured logging across all Snaplink services.
 * Uses pino for high-performance JSON logging.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@snaplink/logger";
 *
 * // Use default logger
 * logger.info({ shortCode: "abc123" }, "Short URL created");
 *
 * // Create service-specific logger
 * const redirectLogger = createLogger("redirect");
 * redirectLogger.error({ err }, "Lookup failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "snaplink";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;
  /** Pretty-print even outside development */
  pretty?: boolean;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const pretty = options.pretty ?? NODE_ENV === "development";

  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

/**
 * Logger that drops everything. For tests and tools that must stay quiet.
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * Logger that keeps every JSON line it writes, for asserting on log output.
 */
export function createMemoryLogger(level: LogLevel = "debug"): { logger: pino.Logger; entries: string[] } {
  const entries: string[] = [];
  const logger = pino(
    { level },
    {
      write: (line: string) => {
        entries.push(line);
      },
    }
  );
  return { logger, entries };
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger for general use
 */
export const logger = createLogger("main");

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return logger.isLevelEnabled(level);
}

// Re-export pino types for consumers
export type { Logger } from "pino";
