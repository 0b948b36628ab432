/**
 * Logger Module
 * Structured logging using pino with pretty console output in development
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && !isTest();
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "lock-manager", "presence", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("lock-manager");
 * logger.info({ lockId }, "Lock granted");
 * logger.error({ err }, "Sweep failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), pretty = isDevelopment() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}

export type Logger = PinoLogger;
