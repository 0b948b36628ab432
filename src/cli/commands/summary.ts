/**
 * summary command - Show who is active in a project and which cells are locked
 */

import chalk from "chalk";
import type { CollaborationSummary } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { openWorkspace, type WorkspaceOptions } from "../workspace.js";

const logger = createLogger("summary");

export interface SummaryOptions {
  project: string;
}

export function formatSummary(summary: CollaborationSummary): string[] {
  const lines = [`Active users: ${summary.totalActiveUsers}`];
  for (const user of summary.activeUsers) {
    lines.push(`  ${user.userId} (${user.currentActivity})`);
  }

  lines.push(`Active locks: ${summary.totalActiveLocks}`);
  for (const lock of summary.activeLocks) {
    lines.push(
      `  ${lock.sourceObjectId} -> ${lock.targetObjectId} by ${lock.lockedBy} (${lock.minutesRemaining.toFixed(2)} min left)`
    );
  }

  lines.push(`Recent changes: ${summary.recentChanges.length}`);
  return lines;
}

export async function summaryCommand(
  workspacePath: string,
  options: SummaryOptions,
  workspaceOptions: WorkspaceOptions = {}
): Promise<void> {
  logger.info({ workspacePath, options }, "Summary command");

  const workspace = await openWorkspace(workspacePath, workspaceOptions);
  const summary = await workspace.core.facade.getCollaborationSummary(options.project);

  console.log();
  console.log(chalk.cyan.bold(`Collaboration in ${options.project}`));
  console.log(chalk.dim("─".repeat(40)));
  for (const line of formatSummary(summary)) {
    console.log(line);
  }
}
