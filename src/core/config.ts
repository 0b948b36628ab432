/**
 * Collaboration Configuration
 *
 * Zod-validated settings for lock grant duration, presence windows and the
 * sweep job. Read from `.nom-collab/config.json` when present.
 *
 * @module
 */

import { z } from "zod";
import { fileExists, getConfigPath, readJson } from "../utils/index.js";
import { ConfigurationError } from "./errors.js";

const MINUTE_MS = 60 * 1000;

export const CollaborationConfigSchema = z.object({
  /** Fixed lifetime of a cell lock, counted from acquisition */
  lockGrantDurationMs: z.number().int().positive().default(5 * MINUTE_MS),

  /** Presence is "active" while last-seen falls inside this window */
  presenceActiveWindowMs: z.number().int().positive().default(5 * MINUTE_MS),

  /** Presence older than this is reclaimed by a sweep */
  presenceStaleWindowMs: z.number().int().positive().default(60 * MINUTE_MS),

  /** Interval of the background sweeper */
  sweepIntervalMs: z.number().int().positive().default(MINUTE_MS),

  /** Permit storing a relationship whose source and target are the same object */
  allowSelfReference: z.boolean().default(false),

  /** Number of recently updated relationships in the collaboration summary */
  recentChangesLimit: z.number().int().min(0).max(100).default(10),
});

export type CollaborationConfig = z.infer<typeof CollaborationConfigSchema>;
export type CollaborationConfigInput = z.input<typeof CollaborationConfigSchema>;

export const DEFAULT_COLLABORATION_CONFIG: CollaborationConfig = CollaborationConfigSchema.parse({});

/**
 * Validate a partial configuration, filling defaults
 *
 * @throws ConfigurationError when a value is out of range or of the wrong type
 */
export function parseCollaborationConfig(input: unknown): CollaborationConfig {
  const result = CollaborationConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError("Invalid collaboration configuration", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  if (result.data.presenceStaleWindowMs < result.data.presenceActiveWindowMs) {
    throw new ConfigurationError("presenceStaleWindowMs must not be shorter than presenceActiveWindowMs", {
      presenceActiveWindowMs: result.data.presenceActiveWindowMs,
      presenceStaleWindowMs: result.data.presenceStaleWindowMs,
    });
  }
  return result.data;
}

/**
 * Load configuration for a project root, layering overrides on top of the
 * config file (if any) and the defaults
 */
export function loadCollaborationConfig(
  projectRoot?: string,
  overrides: CollaborationConfigInput = {}
): CollaborationConfig {
  const configPath = getConfigPath(projectRoot);
  let fileConfig: Record<string, unknown> = {};

  if (fileExists(configPath)) {
    const raw = readJson(configPath);
    if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
      throw new ConfigurationError("Configuration file is not a JSON object", { configPath });
    }
    fileConfig = { ...raw };
  }

  return parseCollaborationConfig({ ...fileConfig, ...overrides });
}
