/**
 * Matrix Assembler Implementation
 *
 * Builds the NOM grid in O(n² + m): relationships, active locks and presence
 * coordinates are each indexed once, then every cell is a map lookup.
 *
 * @module
 */

import type { IMatrixAssembler } from "../interfaces/IMatrixAssembler.js";
import type { IObjectCatalog, IRelationshipStore } from "../../relationships/interfaces/IRelationshipStore.js";
import type { ILockManager } from "../../locks/interfaces/ILockManager.js";
import type { IPresenceTracker } from "../../presence/interfaces/IPresenceTracker.js";
import {
  pairKey,
  type ProjectObject,
  type Relationship,
} from "../../relationships/models/relationship-models.js";
import type { Lock } from "../../locks/models/lock-models.js";
import { toPresenceView, type PresenceView } from "../../presence/models/presence-models.js";
import {
  computeCompletionPercentage,
  type Matrix,
  type MatrixCell,
  type MatrixObjectSummary,
} from "../models/matrix-models.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("matrix-assembler");

export interface MatrixPresenceSource {
  tracker: IPresenceTracker;
  activeWindowMs: number;
}

export interface MatrixAssemblerDeps {
  objects: IObjectCatalog;
  relationships: IRelationshipStore;
  locks: ILockManager;
  /** Without it, cells carry no viewers and `activeUsers` is empty */
  presence?: MatrixPresenceSource;
}

/**
 * Orders strings by Unicode code point. Plain `<` compares UTF-16 code units,
 * which sorts astral characters before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const difference = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (difference !== 0) return difference;
  }
  return left.length - right.length;
}

/**
 * Deterministic row/column order: name, then id
 */
export function compareObjects(a: ProjectObject, b: ProjectObject): number {
  return compareCodePoints(a.name, b.name) || compareCodePoints(a.id, b.id);
}

function coordinateKey(row: number, col: number): string {
  return `${row}:${col}`;
}

export class MatrixAssembler implements IMatrixAssembler {
  private deps: MatrixAssemblerDeps;

  constructor(deps: MatrixAssemblerDeps) {
    this.deps = deps;
  }

  async assemble(projectId: string, now: Date): Promise<Matrix> {
    const startedAt = Date.now();

    const [objects, relationships, activeLocks, activeUsers] = await Promise.all([
      this.deps.objects.listByProject(projectId),
      this.deps.relationships.listByProject(projectId),
      // The lock pair key carries no project, so neither does this lookup
      this.deps.locks.listActive(now),
      this.loadActiveUsers(projectId, now),
    ]);

    const ordered = [...objects].sort(compareObjects);
    const relationshipsByPair = this.indexRelationships(relationships);
    const locksByPair = this.indexLocks(activeLocks);
    const viewersByCell = this.indexViewers(activeUsers, ordered.length);

    const matrixData: MatrixCell[][] = ordered.map((source, i) =>
      ordered.map((target, j) => {
        const key = pairKey(source.id, target.id);
        const lock = locksByPair.get(key);
        const isSelfReference = i === j;
        return {
          sourceObjectId: source.id,
          targetObjectId: target.id,
          relationship: relationshipsByPair.get(key) ?? null,
          isSelfReference,
          canEdit: !isSelfReference,
          isLocked: lock !== undefined,
          lockedBy: lock?.lockedBy ?? null,
          viewers: viewersByCell.get(coordinateKey(i, j)) ?? [],
        };
      })
    );

    const matrix: Matrix = {
      projectId,
      objects: this.summarizeObjects(ordered, relationships),
      matrixData,
      totalObjects: ordered.length,
      totalRelationships: relationships.length,
      completionPercentage: computeCompletionPercentage(ordered.length, relationships.length),
      activeUsers,
      generatedAt: now.toISOString(),
    };

    logger.debug(
      {
        projectId,
        objects: matrix.totalObjects,
        relationships: matrix.totalRelationships,
        locks: locksByPair.size,
        durationMs: Date.now() - startedAt,
      },
      "Matrix assembled"
    );
    return matrix;
  }

  private async loadActiveUsers(projectId: string, now: Date): Promise<PresenceView[]> {
    const source = this.deps.presence;
    if (!source) return [];

    const active = await source.tracker.listActive(projectId, now, source.activeWindowMs);
    return active.map((presence) => toPresenceView(presence, now, source.activeWindowMs));
  }

  private indexRelationships(relationships: Relationship[]): Map<string, Relationship> {
    const index = new Map<string, Relationship>();
    for (const relationship of relationships) {
      index.set(pairKey(relationship.sourceObjectId, relationship.targetObjectId), relationship);
    }
    return index;
  }

  private indexLocks(locks: Lock[]): Map<string, Lock> {
    const index = new Map<string, Lock>();
    for (const lock of locks) {
      index.set(pairKey(lock.sourceObjectId, lock.targetObjectId), lock);
    }
    return index;
  }

  private indexViewers(activeUsers: PresenceView[], size: number): Map<string, string[]> {
    const index = new Map<string, string[]>();
    for (const presence of activeUsers) {
      const { matrixRow, matrixCol } = presence;
      if (matrixRow === null || matrixCol === null) continue;
      if (matrixRow >= size || matrixCol >= size) continue;

      const key = coordinateKey(matrixRow, matrixCol);
      const viewers = index.get(key);
      if (viewers) {
        viewers.push(presence.userId);
      } else {
        index.set(key, [presence.userId]);
      }
    }
    return index;
  }

  private summarizeObjects(ordered: ProjectObject[], relationships: Relationship[]): MatrixObjectSummary[] {
    const outgoing = new Map<string, number>();
    const incoming = new Map<string, number>();
    for (const relationship of relationships) {
      outgoing.set(relationship.sourceObjectId, (outgoing.get(relationship.sourceObjectId) ?? 0) + 1);
      incoming.set(relationship.targetObjectId, (incoming.get(relationship.targetObjectId) ?? 0) + 1);
    }

    return ordered.map((object) => ({
      id: object.id,
      name: object.name,
      definition: object.definition,
      synonymCount: object.synonyms.length,
      outgoingRelationshipCount: outgoing.get(object.id) ?? 0,
      incomingRelationshipCount: incoming.get(object.id) ?? 0,
    }));
  }
}
