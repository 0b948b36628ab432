/**
 * matrix command - Print the object matrix of a project
 */

import chalk from "chalk";
import type { Matrix, MatrixCell } from "../../core/index.js";
import { createLogger } from "../../utils/index.js";
import { openWorkspace, type WorkspaceOptions } from "../workspace.js";

const logger = createLogger("matrix");

export interface MatrixOptions {
  project: string;
}

export const CELL_GLYPHS = {
  relationship: "●",
  empty: "·",
  diagonal: "\\",
  locked: "L",
} as const;

export function cellGlyph(cell: MatrixCell): string {
  if (cell.isSelfReference) return CELL_GLYPHS.diagonal;
  if (cell.isLocked) return CELL_GLYPHS.locked;
  return cell.relationship ? CELL_GLYPHS.relationship : CELL_GLYPHS.empty;
}

/**
 * Plain-text grid: a header of column numbers, then one row per object
 */
export function renderMatrixGrid(matrix: Matrix): string[] {
  if (matrix.objects.length === 0) {
    return ["(no objects)"];
  }

  const labelWidth = Math.max(...matrix.objects.map((object) => object.name.length));
  const cellWidth = String(matrix.objects.length).length;

  const header = matrix.objects.map((_, j) => String(j + 1).padStart(cellWidth)).join(" ");
  const rows = matrix.matrixData.map((row, i) => {
    const label = (matrix.objects[i]?.name ?? "").padEnd(labelWidth);
    const cells = row.map((cell) => cellGlyph(cell).padStart(cellWidth)).join(" ");
    return `${label} ${cells}`;
  });

  return [`${" ".repeat(labelWidth)} ${header}`, ...rows];
}

export function formatMatrixMetrics(matrix: Matrix): string {
  return [
    `Objects: ${matrix.totalObjects}`,
    `Relationships: ${matrix.totalRelationships}`,
    `Completion: ${matrix.completionPercentage.toFixed(2)}%`,
    `Active users: ${matrix.activeUsers.length}`,
  ].join("  ");
}

/**
 * Print the object matrix of a project stored in a workspace file
 */
export async function matrixCommand(
  workspacePath: string,
  options: MatrixOptions,
  workspaceOptions: WorkspaceOptions = {}
): Promise<void> {
  logger.info({ workspacePath, options }, "Matrix command");

  const workspace = await openWorkspace(workspacePath, workspaceOptions);
  const matrix = await workspace.core.facade.getMatrix(options.project);

  console.log();
  console.log(chalk.cyan.bold(`Project ${options.project}`));
  console.log(chalk.dim("─".repeat(40)));

  const [header, ...rows] = renderMatrixGrid(matrix);
  console.log(chalk.dim(header));
  for (const row of rows) {
    console.log(row);
  }

  console.log();
  console.log(formatMatrixMetrics(matrix));
  console.log(
    chalk.dim(
      `${CELL_GLYPHS.relationship} relationship  ${CELL_GLYPHS.empty} empty  ${CELL_GLYPHS.diagonal} self  ${CELL_GLYPHS.locked} locked`
    )
  );
}
