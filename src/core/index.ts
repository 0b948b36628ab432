/**
 * Core module - Collaboration components shared by the CLI and library consumers
 */

// Re-export error classes
export * from "./errors.js";

export * from "./clock.js";
export * from "./config.js";

// Re-export all core modules
export * from "./storage/index.js";
export * from "./relationships/index.js";
export * from "./locks/index.js";
export * from "./presence/index.js";
export * from "./matrix/index.js";
export * from "./collaboration/index.js";

// Re-export types
export * from "../types/result.js";
