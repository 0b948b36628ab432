/**
 * Collaboration Facade Implementation
 *
 * Validates caller input with zod, checks project membership of the objects a
 * request touches, and delegates to the relationship store, lock manager,
 * presence tracker and matrix assembler.
 *
 * @module
 */

import type { z } from "zod";
import type { CollaborationSummary, ICollaborationFacade } from "../interfaces/ICollaborationFacade.js";
import type { IObjectCatalog, IRelationshipStore } from "../../relationships/interfaces/IRelationshipStore.js";
import type { ILockManager } from "../../locks/interfaces/ILockManager.js";
import type { IPresenceTracker } from "../../presence/interfaces/IPresenceTracker.js";
import type { IMatrixAssembler } from "../../matrix/interfaces/IMatrixAssembler.js";
import type { Matrix } from "../../matrix/models/matrix-models.js";
import {
  createRelationshipRecord,
  RelationshipCreateInputSchema,
  RelationshipSearchRequestSchema,
  RelationshipUpdateInputSchema,
  type Relationship,
  type RelationshipCreateInput,
  type RelationshipPage,
  type RelationshipPatch,
  type RelationshipSearchRequest,
  type RelationshipUpdateInput,
} from "../../relationships/models/relationship-models.js";
import { LockRequestSchema, toLockView, type LockRequest, type LockView } from "../../locks/models/lock-models.js";
import {
  PresenceUpdateRequestSchema,
  toPresenceView,
  type PresenceUpdateRequest,
  type PresenceView,
} from "../../presence/models/presence-models.js";
import type { CollaborationConfig } from "../../config.js";
import { systemClock, type Clock } from "../../clock.js";
import {
  ConflictError,
  ErrorCode,
  NotFoundError,
  ValidationError,
  type CollaborationError,
} from "../../errors.js";
import { err, ok, type Result } from "../../../types/result.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("collaboration");

const SessionIdSchema = LockRequestSchema.shape.sessionId;

export interface CollaborationFacadeDeps {
  objects: IObjectCatalog;
  relationships: IRelationshipStore;
  locks: ILockManager;
  presence: IPresenceTracker;
  matrix: IMatrixAssembler;
  config: CollaborationConfig;
  clock?: Clock;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

function invalidInput(message: string, error: z.ZodError): ValidationError {
  return new ValidationError(message, ErrorCode.VALIDATION_FAILED, { issues: formatIssues(error) });
}

function relationshipNotFound(projectId: string, relationshipId: string): NotFoundError {
  return new NotFoundError("Relationship not found", ErrorCode.NOT_FOUND_RELATIONSHIP, {
    projectId,
    relationshipId,
  });
}

export class CollaborationFacade implements ICollaborationFacade {
  private deps: CollaborationFacadeDeps;
  private clock: Clock;

  constructor(deps: CollaborationFacadeDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
  }

  // ===========================================================================
  // Relationships
  // ===========================================================================

  async createRelationship(
    projectId: string,
    input: RelationshipCreateInput,
    actorId: string
  ): Promise<Result<Relationship, CollaborationError>> {
    const parsed = RelationshipCreateInputSchema.safeParse(input);
    if (!parsed.success) {
      return err(invalidInput("Invalid relationship", parsed.error));
    }
    const data = parsed.data;

    if (data.sourceObjectId === data.targetObjectId && !this.deps.config.allowSelfReference) {
      return err(
        new ValidationError("An object cannot be related to itself", ErrorCode.VALIDATION_SELF_REFERENCE, {
          projectId,
          objectId: data.sourceObjectId,
          issues: ["targetObjectId: must differ from sourceObjectId"],
        })
      );
    }

    const existing = await this.deps.relationships.findByPair(
      projectId,
      data.sourceObjectId,
      data.targetObjectId
    );
    if (existing) {
      return err(
        new ConflictError(
          "Relationship between these objects already exists",
          ErrorCode.CONFLICT_DUPLICATE_RELATIONSHIP,
          { projectId, relationshipId: existing.id }
        )
      );
    }

    const membership = await this.checkEndpoints(projectId, data.sourceObjectId, data.targetObjectId);
    if (!membership.ok) return membership;

    const created = await this.deps.relationships.create(
      createRelationshipRecord(projectId, data, actorId, this.clock.now())
    );
    if (created.ok) {
      logger.info(
        { projectId, relationshipId: created.value.id, actorId },
        "Relationship created"
      );
    }
    return created;
  }

  async getRelationship(projectId: string, relationshipId: string): Promise<Result<Relationship, NotFoundError>> {
    const relationship = await this.deps.relationships.findById(projectId, relationshipId);
    return relationship ? ok(relationship) : err(relationshipNotFound(projectId, relationshipId));
  }

  async updateRelationship(
    projectId: string,
    relationshipId: string,
    input: RelationshipUpdateInput,
    actorId: string
  ): Promise<Result<Relationship, CollaborationError>> {
    const parsed = RelationshipUpdateInputSchema.safeParse(input);
    if (!parsed.success) {
      return err(invalidInput("Invalid relationship update", parsed.error));
    }

    const existing = await this.deps.relationships.findById(projectId, relationshipId);
    if (!existing) {
      return err(relationshipNotFound(projectId, relationshipId));
    }

    const fields = parsed.data;
    const patch: RelationshipPatch = {
      updatedAt: this.clock.now().toISOString(),
      updatedBy: actorId,
    };
    if (fields.cardinality !== undefined) patch.cardinality = fields.cardinality;
    if (fields.forwardLabel !== undefined) patch.forwardLabel = fields.forwardLabel;
    if (fields.reverseLabel !== undefined) patch.reverseLabel = fields.reverseLabel;
    if (fields.isBidirectional !== undefined) patch.isBidirectional = fields.isBidirectional;
    if (fields.description !== undefined) patch.description = fields.description;
    if (fields.strength !== undefined) patch.strength = fields.strength;

    const updated = await this.deps.relationships.update(existing.id, patch);
    if (!updated) {
      // Deleted between the read and the write
      return err(relationshipNotFound(projectId, relationshipId));
    }

    logger.info({ projectId, relationshipId, actorId }, "Relationship updated");
    return ok(updated);
  }

  async deleteRelationship(projectId: string, relationshipId: string): Promise<Result<Relationship, NotFoundError>> {
    const existing = await this.deps.relationships.findById(projectId, relationshipId);
    if (!existing || !(await this.deps.relationships.delete(existing.id))) {
      return err(relationshipNotFound(projectId, relationshipId));
    }

    logger.info({ projectId, relationshipId }, "Relationship deleted");
    return ok(existing);
  }

  async searchRelationships(
    projectId: string,
    request: RelationshipSearchRequest
  ): Promise<Result<RelationshipPage, CollaborationError>> {
    const parsed = RelationshipSearchRequestSchema.safeParse(request);
    if (!parsed.success) {
      return err(invalidInput("Invalid search request", parsed.error));
    }

    const { sortBy, sortOrder, limit, offset, ...filter } = parsed.data;
    const { relationships, total } = await this.deps.relationships.search(projectId, filter, {
      sortBy,
      sortOrder,
      limit,
      offset,
    });

    return ok({
      relationships,
      total,
      limit,
      offset,
      hasMore: offset + limit < total,
    });
  }

  async listRelationships(projectId: string): Promise<Relationship[]> {
    return this.deps.relationships.listByProject(projectId);
  }

  // ===========================================================================
  // Locks
  // ===========================================================================

  async acquireLock(
    projectId: string,
    request: LockRequest,
    userId: string
  ): Promise<Result<LockView, CollaborationError>> {
    const parsed = LockRequestSchema.safeParse(request);
    if (!parsed.success) {
      return err(invalidInput("Invalid lock request", parsed.error));
    }
    const data = parsed.data;

    // Diagonal cells are never editable
    if (data.sourceObjectId === data.targetObjectId) {
      return err(
        new ValidationError("Diagonal cells cannot be locked", ErrorCode.VALIDATION_SELF_REFERENCE, {
          projectId,
          objectId: data.sourceObjectId,
          issues: ["targetObjectId: must differ from sourceObjectId"],
        })
      );
    }

    const membership = await this.checkEndpoints(projectId, data.sourceObjectId, data.targetObjectId);
    if (!membership.ok) return membership;

    const now = this.clock.now();
    const acquired = await this.deps.locks.acquire(
      {
        projectId,
        pair: { sourceObjectId: data.sourceObjectId, targetObjectId: data.targetObjectId },
        holder: userId,
        sessionId: data.sessionId,
        kind: data.lockType,
      },
      now
    );
    return acquired.ok ? ok(toLockView(acquired.value, now)) : acquired;
  }

  async releaseLock(lockId: string, userId: string): Promise<boolean> {
    return this.deps.locks.release(lockId, userId);
  }

  async cleanupExpiredLocks(): Promise<number> {
    return this.deps.locks.sweepExpired(this.clock.now());
  }

  // ===========================================================================
  // Presence
  // ===========================================================================

  async updatePresence(
    projectId: string,
    userId: string,
    sessionId: string,
    update: PresenceUpdateRequest
  ): Promise<Result<PresenceView, CollaborationError>> {
    const session = SessionIdSchema.safeParse(sessionId);
    if (!session.success) {
      return err(invalidInput("Invalid session id", session.error));
    }
    const parsed = PresenceUpdateRequestSchema.safeParse(update);
    if (!parsed.success) {
      return err(invalidInput("Invalid presence update", parsed.error));
    }

    const now = this.clock.now();
    const presence = await this.deps.presence.heartbeat(
      {
        projectId,
        userId,
        sessionId: session.data,
        activity: parsed.data.currentActivity,
        currentObjectId: parsed.data.currentObjectId,
        matrixRow: parsed.data.matrixRow,
        matrixCol: parsed.data.matrixCol,
      },
      now
    );
    return ok(toPresenceView(presence, now, this.deps.config.presenceActiveWindowMs));
  }

  async listActivePresence(projectId: string): Promise<PresenceView[]> {
    const now = this.clock.now();
    const windowMs = this.deps.config.presenceActiveWindowMs;
    const active = await this.deps.presence.listActive(projectId, now, windowMs);
    return active.map((presence) => toPresenceView(presence, now, windowMs));
  }

  async leaveProject(projectId: string, userId: string): Promise<boolean> {
    return this.deps.presence.leave(projectId, userId);
  }

  async cleanupInactivePresence(): Promise<number> {
    return this.deps.presence.sweepStale(this.clock.now(), this.deps.config.presenceStaleWindowMs);
  }

  // ===========================================================================
  // Matrix
  // ===========================================================================

  async getMatrix(projectId: string): Promise<Matrix> {
    return this.deps.matrix.assemble(projectId, this.clock.now());
  }

  async getCollaborationSummary(projectId: string): Promise<CollaborationSummary> {
    const now = this.clock.now();
    const windowMs = this.deps.config.presenceActiveWindowMs;

    const [users, locks, recentChanges] = await Promise.all([
      this.deps.presence.listActive(projectId, now, windowMs),
      this.deps.locks.listActive(now, projectId),
      this.deps.relationships.listRecentlyUpdated(projectId, this.deps.config.recentChangesLimit),
    ]);

    return {
      activeUsers: users.map((presence) => toPresenceView(presence, now, windowMs)),
      activeLocks: locks.map((lock) => toLockView(lock, now)),
      recentChanges,
      totalActiveUsers: users.length,
      totalActiveLocks: locks.length,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async checkEndpoints(
    projectId: string,
    sourceObjectId: string,
    targetObjectId: string
  ): Promise<Result<void, ValidationError>> {
    const [source, target] = await Promise.all([
      this.deps.objects.findInProject(projectId, sourceObjectId),
      this.deps.objects.findInProject(projectId, targetObjectId),
    ]);

    const issues: string[] = [];
    if (!source) issues.push(`sourceObjectId: ${sourceObjectId} is not an object of project ${projectId}`);
    if (!target) issues.push(`targetObjectId: ${targetObjectId} is not an object of project ${projectId}`);

    if (issues.length > 0) {
      return err(
        new ValidationError("Objects not found in project", ErrorCode.VALIDATION_OBJECT_NOT_IN_PROJECT, {
          projectId,
          issues,
        })
      );
    }
    return ok(undefined);
  }
}
