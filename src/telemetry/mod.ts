/**
 * Telemetry Module
 *
 * @module telemetry
 */

export { getLogger, isLogLevel, setupLogger } from "./logger.ts";
export type { LogLevel, Logger, LoggerConfig } from "./logger.ts";
