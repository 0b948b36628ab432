/**
 * Workspace files
 *
 * A workspace is a JSON snapshot of the collaboration tables. Commands load it
 * into the in-memory adapter, operate on the core, and optionally write it
 * back.
 */

import {
  createCollaborationCore,
  dumpSnapshot,
  ErrorCode,
  loadCollaborationConfig,
  loadSnapshot,
  MemoryStorageAdapter,
  ValidationError,
  WorkspaceSnapshotSchema,
  type Clock,
  type CollaborationConfig,
  type CollaborationCore,
  type SnapshotCounts,
} from "../core/index.js";
import { createLogger, readJson, writeJson } from "../utils/index.js";

const logger = createLogger("workspace");

export interface WorkspaceOptions {
  /** Defaults to the config file of the current directory */
  config?: CollaborationConfig;
  clock?: Clock;
}

export interface Workspace {
  filePath: string;
  core: CollaborationCore;
  counts: SnapshotCounts;
  save(): Promise<void>;
}

export async function openWorkspace(filePath: string, options: WorkspaceOptions = {}): Promise<Workspace> {
  const raw = readJson(filePath);
  if (raw === null) {
    throw new ValidationError(`Cannot read workspace file ${filePath}`, ErrorCode.VALIDATION_INVALID_SNAPSHOT, {
      filePath,
    });
  }

  const parsed = WorkspaceSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid workspace file ${filePath}`, ErrorCode.VALIDATION_INVALID_SNAPSHOT, {
      filePath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const config = options.config ?? loadCollaborationConfig();
  const core = createCollaborationCore(new MemoryStorageAdapter(), config, options.clock);
  const counts = await loadSnapshot(core.tables, parsed.data);
  logger.debug({ filePath, ...counts }, "Workspace loaded");

  return {
    filePath,
    core,
    counts,
    save: async () => {
      writeJson(filePath, await dumpSnapshot(core.tables));
      logger.debug({ filePath }, "Workspace saved");
    },
  };
}
