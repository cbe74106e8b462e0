/**
 * Logger Module
 *
 * Structured logging on pino. Output goes to stderr by default because
 * stdout carries the MCP stdio transport.
 *
 * Loggers returned by getLogger() are resolved lazily, so module-level
 * `const logger = getLogger("vector")` picks up the configuration applied
 * later by setupLogger().
 *
 * @module telemetry/logger
 */

import pino, { type DestinationStream, type Level, type Logger as PinoLogger } from "pino";

export type LogLevel = Level | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Defaults to stderr */
  destination?: DestinationStream;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

let root: PinoLogger = createRoot({});
let generation = 0;

function createRoot(config: LoggerConfig): PinoLogger {
  return pino(
    {
      level: config.level ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    config.destination ?? pino.destination(2),
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * (Re)configure the root logger. Safe to call more than once.
 */
export function setupLogger(config: LoggerConfig = {}): void {
  root = createRoot(config);
  generation++;
}

/**
 * Get a named logger
 */
export function getLogger(name: string): Logger {
  let cached: PinoLogger | null = null;
  let cachedGeneration = -1;

  const current = (): PinoLogger => {
    if (cached === null || cachedGeneration !== generation) {
      cached = root.child({ module: name });
      cachedGeneration = generation;
    }
    return cached;
  };

  return {
    debug: (message, context) => current().debug(context ?? {}, message),
    info: (message, context) => current().info(context ?? {}, message),
    warn: (message, context) => current().warn(context ?? {}, message),
    error: (message, context) => current().error(context ?? {}, message),
  };
}
