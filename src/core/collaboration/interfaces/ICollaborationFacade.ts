/**
 * Collaboration Facade Interface
 *
 * The single entry point the transport layer talks to. Expected outcomes come
 * back as result values; storage failures are thrown as StorageError.
 */

import type { Result } from "../../../types/result.js";
import type { CollaborationError, NotFoundError } from "../../errors.js";
import type {
  Relationship,
  RelationshipCreateInput,
  RelationshipPage,
  RelationshipSearchRequest,
  RelationshipUpdateInput,
} from "../../relationships/models/relationship-models.js";
import type { LockRequest, LockView } from "../../locks/models/lock-models.js";
import type { PresenceUpdateRequest, PresenceView } from "../../presence/models/presence-models.js";
import type { Matrix } from "../../matrix/models/matrix-models.js";

export interface CollaborationSummary {
  activeUsers: PresenceView[];
  activeLocks: LockView[];
  recentChanges: Relationship[];
  totalActiveUsers: number;
  totalActiveLocks: number;
}

export interface ICollaborationFacade {
  // ===========================================================================
  // Relationships
  // ===========================================================================

  /**
   * Conflict if the ordered pair is taken; ValidationError if an endpoint is
   * not an object of the project or the pair is a disallowed self-loop
   */
  createRelationship(
    projectId: string,
    input: RelationshipCreateInput,
    actorId: string
  ): Promise<Result<Relationship, CollaborationError>>;

  getRelationship(projectId: string, relationshipId: string): Promise<Result<Relationship, NotFoundError>>;

  /**
   * Only fields present in `input` change
   */
  updateRelationship(
    projectId: string,
    relationshipId: string,
    input: RelationshipUpdateInput,
    actorId: string
  ): Promise<Result<Relationship, CollaborationError>>;

  /**
   * Returns the removed relationship
   */
  deleteRelationship(projectId: string, relationshipId: string): Promise<Result<Relationship, NotFoundError>>;

  searchRelationships(
    projectId: string,
    request: RelationshipSearchRequest
  ): Promise<Result<RelationshipPage, CollaborationError>>;

  listRelationships(projectId: string): Promise<Relationship[]>;

  // ===========================================================================
  // Locks
  // ===========================================================================

  acquireLock(
    projectId: string,
    request: LockRequest,
    userId: string
  ): Promise<Result<LockView, CollaborationError>>;

  releaseLock(lockId: string, userId: string): Promise<boolean>;

  cleanupExpiredLocks(): Promise<number>;

  // ===========================================================================
  // Presence
  // ===========================================================================

  updatePresence(
    projectId: string,
    userId: string,
    sessionId: string,
    update: PresenceUpdateRequest
  ): Promise<Result<PresenceView, CollaborationError>>;

  listActivePresence(projectId: string): Promise<PresenceView[]>;

  leaveProject(projectId: string, userId: string): Promise<boolean>;

  cleanupInactivePresence(): Promise<number>;

  // ===========================================================================
  // Matrix
  // ===========================================================================

  getMatrix(projectId: string): Promise<Matrix>;

  getCollaborationSummary(projectId: string): Promise<CollaborationSummary>;
}
