/**
 * Matrix Assembler Interface
 */

import type { Matrix } from "../models/matrix-models.js";

export interface IMatrixAssembler {
  /**
   * Build the full matrix of a project as of `now`
   */
  assemble(projectId: string, now: Date): Promise<Matrix>;
}
