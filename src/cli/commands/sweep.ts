/**
 * sweep command - Remove expired locks and stale presence from a workspace
 */

import chalk from "chalk";
import type { SweepResult } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { openWorkspace, type WorkspaceOptions } from "../workspace.js";

const logger = createLogger("sweep");

export interface SweepOptions {
  dryRun?: boolean;
}

/**
 * Run both sweeps against a workspace file, writing it back unless dry-run
 */
export async function sweepWorkspace(
  workspacePath: string,
  options: SweepOptions = {},
  workspaceOptions: WorkspaceOptions = {}
): Promise<SweepResult> {
  const workspace = await openWorkspace(workspacePath, workspaceOptions);
  const result = await workspace.core.sweeper.runOnce();

  if (!options.dryRun) {
    await workspace.save();
  }
  return result;
}

export async function sweepCommand(
  workspacePath: string,
  options: SweepOptions,
  workspaceOptions: WorkspaceOptions = {}
): Promise<void> {
  logger.info({ workspacePath, options }, "Sweep command");

  const result = await sweepWorkspace(workspacePath, options, workspaceOptions);

  console.log(`Expired locks removed:    ${chalk.cyan(result.locks)}`);
  console.log(`Stale presence removed:   ${chalk.cyan(result.presence)}`);
  if (options.dryRun) {
    console.log(chalk.yellow("Dry run: workspace not written"));
  }
}
