#!/usr/bin/env node

/**
 * NOM Collab CLI
 * Inspect and maintain collaboration workspace files
 */

import { Command } from "commander";
import chalk from "chalk";
import { matrixCommand, type MatrixOptions } from "./commands/matrix.js";
import { sweepCommand, type SweepOptions } from "./commands/sweep.js";
import { summaryCommand, type SummaryOptions } from "./commands/summary.js";
import { isNomCollabError } from "../core/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("nom-collab")
  .description("Cell locks, presence and matrix views for Nested Object Matrix workspaces")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("matrix")
  .description("Print the object matrix of a project")
  .argument("<workspace>", "Workspace JSON file")
  .requiredOption("-p, --project <id>", "Project id")
  .action((workspace: string, options: MatrixOptions) => matrixCommand(workspace, options));

program
  .command("sweep")
  .description("Remove expired locks and stale presence records")
  .argument("<workspace>", "Workspace JSON file")
  .option("-n, --dry-run", "Report what would be removed without writing the file")
  .action((workspace: string, options: SweepOptions) => sweepCommand(workspace, options));

program
  .command("summary")
  .description("Show active users, active locks and recent changes of a project")
  .argument("<workspace>", "Workspace JSON file")
  .requiredOption("-p, --project <id>", "Project id")
  .action((workspace: string, options: SummaryOptions) => summaryCommand(workspace, options));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (isNomCollabError(error) && error.context && Array.isArray(error.context.issues)) {
      for (const issue of error.context.issues) {
        console.error(chalk.dim(`  ${String(issue)}`));
      }
    }
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
