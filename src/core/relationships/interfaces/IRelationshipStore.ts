/**
 * Relationship Store Interfaces
 *
 * Durable record of directed object-pair relationships and read access to the
 * objects they connect. No concurrency logic lives here beyond the uniqueness
 * of (project, source, target).
 */

import type { Result } from "../../../types/result.js";
import type { ConflictError } from "../../errors.js";
import type {
  ProjectObject,
  Relationship,
  RelationshipFilter,
  RelationshipPatch,
  RelationshipSortField,
} from "../models/relationship-models.js";

// =============================================================================
// Object Catalog
// =============================================================================

/**
 * Objects are maintained elsewhere; the core only reads them
 */
export interface IObjectCatalog {
  listByProject(projectId: string): Promise<ProjectObject[]>;

  /**
   * Returns null when the object does not exist or belongs to another project
   */
  findInProject(projectId: string, objectId: string): Promise<ProjectObject | null>;

  register(object: ProjectObject): Promise<ProjectObject>;
}

// =============================================================================
// Relationship Store
// =============================================================================

export interface RelationshipQueryPage {
  sortBy: RelationshipSortField;
  sortOrder: "asc" | "desc";
  limit: number;
  offset: number;
}

export interface IRelationshipStore {
  /**
   * Insert a relationship. Fails with a conflict if the ordered pair is
   * already taken in the project.
   */
  create(relationship: Relationship): Promise<Result<Relationship, ConflictError>>;

  /**
   * Returns null unless both id and project match
   */
  findById(projectId: string, id: string): Promise<Relationship | null>;

  findByPair(projectId: string, sourceObjectId: string, targetObjectId: string): Promise<Relationship | null>;

  /**
   * All relationships of a project, newest first
   */
  listByProject(projectId: string): Promise<Relationship[]>;

  /**
   * Most recently updated relationships of a project
   */
  listRecentlyUpdated(projectId: string, limit: number): Promise<Relationship[]>;

  /**
   * Filtered page plus the size of the whole filtered set
   */
  search(
    projectId: string,
    filter: RelationshipFilter,
    page: RelationshipQueryPage
  ): Promise<{ relationships: Relationship[]; total: number }>;

  countByProject(projectId: string): Promise<number>;

  update(id: string, patch: RelationshipPatch): Promise<Relationship | null>;

  delete(id: string): Promise<boolean>;
}
