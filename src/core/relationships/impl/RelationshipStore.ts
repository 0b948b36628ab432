/**
 * Table-backed object catalog and relationship store
 */

import type { ITable, QueryCondition } from "../../storage/interfaces/IStorageAdapter.js";
import type {
  IObjectCatalog,
  IRelationshipStore,
  RelationshipQueryPage,
} from "../interfaces/IRelationshipStore.js";
import type {
  ProjectObject,
  Relationship,
  RelationshipFilter,
  RelationshipPatch,
} from "../models/relationship-models.js";
import { err, ok, type Result } from "../../../types/result.js";
import { ConflictError, ErrorCode, isUniqueConstraintError, wrapStorageError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("relationship-store");

// =============================================================================
// Object Catalog
// =============================================================================

export class ObjectCatalog implements IObjectCatalog {
  private table: ITable<ProjectObject>;

  constructor(table: ITable<ProjectObject>) {
    this.table = table;
  }

  async listByProject(projectId: string): Promise<ProjectObject[]> {
    return this.table.query([{ field: "projectId", operator: "eq", value: projectId }]);
  }

  async findInProject(projectId: string, objectId: string): Promise<ProjectObject | null> {
    const object = await this.table.findById(objectId);
    if (!object || object.projectId !== projectId) return null;
    return object;
  }

  async register(object: ProjectObject): Promise<ProjectObject> {
    const { id, ...fields } = object;
    const updated = await this.table.update(id, fields);
    return updated ?? this.table.insert(object);
  }
}

// =============================================================================
// Relationship Store
// =============================================================================

export class RelationshipStore implements IRelationshipStore {
  private table: ITable<Relationship>;

  constructor(table: ITable<Relationship>) {
    this.table = table;
  }

  async create(relationship: Relationship): Promise<Result<Relationship, ConflictError>> {
    try {
      const stored = await this.table.insert(relationship);
      logger.debug(
        { id: stored.id, source: stored.sourceObjectId, target: stored.targetObjectId },
        "Relationship stored"
      );
      return ok(stored);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        return err(
          new ConflictError(
            "Relationship between these objects already exists",
            ErrorCode.CONFLICT_DUPLICATE_RELATIONSHIP,
            {
              projectId: relationship.projectId,
              sourceObjectId: relationship.sourceObjectId,
              targetObjectId: relationship.targetObjectId,
            }
          )
        );
      }
      logger.error({ err: error, projectId: relationship.projectId }, "Relationship insert failed");
      throw wrapStorageError(error, "Failed to store relationship", { table: this.table.name });
    }
  }

  async findById(projectId: string, id: string): Promise<Relationship | null> {
    const relationship = await this.table.findById(id);
    if (!relationship || relationship.projectId !== projectId) return null;
    return relationship;
  }

  async findByPair(
    projectId: string,
    sourceObjectId: string,
    targetObjectId: string
  ): Promise<Relationship | null> {
    return this.table.findOne([
      { field: "projectId", operator: "eq", value: projectId },
      { field: "sourceObjectId", operator: "eq", value: sourceObjectId },
      { field: "targetObjectId", operator: "eq", value: targetObjectId },
    ]);
  }

  async listByProject(projectId: string): Promise<Relationship[]> {
    return this.table.query([{ field: "projectId", operator: "eq", value: projectId }], {
      orderBy: [
        { field: "createdAt", direction: "desc" },
        { field: "id", direction: "asc" },
      ],
    });
  }

  async listRecentlyUpdated(projectId: string, limit: number): Promise<Relationship[]> {
    return this.table.query([{ field: "projectId", operator: "eq", value: projectId }], {
      orderBy: [
        { field: "updatedAt", direction: "desc" },
        { field: "id", direction: "asc" },
      ],
      limit,
    });
  }

  async search(
    projectId: string,
    filter: RelationshipFilter,
    page: RelationshipQueryPage
  ): Promise<{ relationships: Relationship[]; total: number }> {
    const conditions = this.buildConditions(projectId, filter);

    // Total is taken over the whole filtered set, independent of the window
    const total = await this.table.count(conditions);
    const relationships = await this.table.query(conditions, {
      orderBy: [
        { field: page.sortBy, direction: page.sortOrder },
        { field: "id", direction: "asc" },
      ],
      limit: page.limit,
      offset: page.offset,
    });

    return { relationships, total };
  }

  async countByProject(projectId: string): Promise<number> {
    return this.table.count([{ field: "projectId", operator: "eq", value: projectId }]);
  }

  async update(id: string, patch: RelationshipPatch): Promise<Relationship | null> {
    return this.table.update(id, patch);
  }

  async delete(id: string): Promise<boolean> {
    return this.table.delete(id);
  }

  private buildConditions(projectId: string, filter: RelationshipFilter): QueryCondition<Relationship>[] {
    const conditions: QueryCondition<Relationship>[] = [
      { field: "projectId", operator: "eq", value: projectId },
    ];

    if (filter.sourceObjectId !== undefined) {
      conditions.push({ field: "sourceObjectId", operator: "eq", value: filter.sourceObjectId });
    }
    if (filter.targetObjectId !== undefined) {
      conditions.push({ field: "targetObjectId", operator: "eq", value: filter.targetObjectId });
    }
    if (filter.cardinality !== undefined) {
      conditions.push({ field: "cardinality", operator: "eq", value: filter.cardinality });
    }
    if (filter.strength !== undefined) {
      conditions.push({ field: "strength", operator: "eq", value: filter.strength });
    }
    if (filter.isBidirectional !== undefined) {
      conditions.push({ field: "isBidirectional", operator: "eq", value: filter.isBidirectional });
    }

    return conditions;
  }
}
