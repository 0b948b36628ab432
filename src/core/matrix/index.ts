/**
 * Matrix Module
 *
 * Assembles the n×n object matrix of a project.
 */

export * from "./models/matrix-models.js";
export * from "./interfaces/IMatrixAssembler.js";
export * from "./impl/MatrixAssembler.js";
