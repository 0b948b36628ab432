/**
 * Matrix Models
 *
 * Renderable n×n view of a project: every ordered object pair with its
 * relationship (if any) and live lock/presence state.
 */

import type { Relationship } from "../../relationships/models/relationship-models.js";
import type { PresenceView } from "../../presence/models/presence-models.js";

export interface MatrixCell {
  sourceObjectId: string;
  targetObjectId: string;
  relationship: Relationship | null;
  isSelfReference: boolean;
  /** Diagonal cells are never directly editable */
  canEdit: boolean;
  isLocked: boolean;
  lockedBy: string | null;
  /** Users whose presence points at this row/column */
  viewers: string[];
}

export interface MatrixObjectSummary {
  id: string;
  name: string;
  definition: string | null;
  synonymCount: number;
  outgoingRelationshipCount: number;
  incomingRelationshipCount: number;
}

export interface Matrix {
  projectId: string;
  /** Row/column order: by name, ties broken by id */
  objects: MatrixObjectSummary[];
  /** `matrixData[i][j]` is the cell from `objects[i]` to `objects[j]` */
  matrixData: MatrixCell[][];
  totalObjects: number;
  totalRelationships: number;
  /** relationships / (n·(n−1)) · 100, clamped to [0, 100]; 0 when n ≤ 1 */
  completionPercentage: number;
  activeUsers: PresenceView[];
  generatedAt: string;
}

/**
 * Share of off-diagonal cells backed by a relationship
 */
export function computeCompletionPercentage(objectCount: number, relationshipCount: number): number {
  if (objectCount <= 1) return 0;
  const totalPossible = objectCount * (objectCount - 1);
  const percentage = (relationshipCount / totalPossible) * 100;
  return Math.max(0, Math.min(100, percentage));
}
