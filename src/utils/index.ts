/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".nom-collab";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

// =============================================================================
// Basic File Operations
// =============================================================================

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Reads and parses a JSON file. Returns null when the file is missing or not
 * valid JSON; callers validate the shape.
 */
export function readJson(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return null;
  }
}

export function writeJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}
