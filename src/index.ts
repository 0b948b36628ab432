/**
 * NOM Collab
 *
 * Concurrency core for collaborative editing of a Nested Object Matrix.
 */

export * from "./core/index.js";
export { createLogger, createChildLogger, type Logger, type LogLevel } from "./utils/logger.js";
