/**
 * Collaboration Table Definitions
 *
 * The four tables the core works against and their unique keys. The unique
 * keys are the only serialization points: (project, source, target) for
 * relationships, (source, target) for locks, (project, user) for presence.
 */

import { z } from "zod";
import type { IStorageAdapter, ITable, TableDefinition } from "./interfaces/IStorageAdapter.js";
import {
  ProjectObjectSchema,
  RelationshipSchema,
  type ProjectObject,
  type Relationship,
} from "../relationships/models/relationship-models.js";
import { LockSchema, type Lock } from "../locks/models/lock-models.js";
import { PresenceSchema, type Presence } from "../presence/models/presence-models.js";
import { PRESENCE_USER_KEY } from "../presence/impl/PresenceTracker.js";

export const OBJECTS_TABLE: TableDefinition<ProjectObject> = {
  name: "objects",
  schema: ProjectObjectSchema,
};

export const RELATIONSHIPS_TABLE: TableDefinition<Relationship> = {
  name: "relationships",
  schema: RelationshipSchema,
  uniqueKeys: {
    pair: ["projectId", "sourceObjectId", "targetObjectId"],
  },
};

export const LOCKS_TABLE: TableDefinition<Lock> = {
  name: "relationship_locks",
  schema: LockSchema,
  uniqueKeys: {
    pair: ["sourceObjectId", "targetObjectId"],
  },
};

export const PRESENCE_TABLE: TableDefinition<Presence> = {
  name: "user_presence",
  schema: PresenceSchema,
  uniqueKeys: {
    [PRESENCE_USER_KEY]: ["projectId", "userId"],
  },
};

export interface CollaborationTables {
  objects: ITable<ProjectObject>;
  relationships: ITable<Relationship>;
  locks: ITable<Lock>;
  presence: ITable<Presence>;
}

export function openCollaborationTables(adapter: IStorageAdapter): CollaborationTables {
  return {
    objects: adapter.createTable(OBJECTS_TABLE),
    relationships: adapter.createTable(RELATIONSHIPS_TABLE),
    locks: adapter.createTable(LOCKS_TABLE),
    presence: adapter.createTable(PRESENCE_TABLE),
  };
}

// =============================================================================
// Workspace Snapshots
// =============================================================================

/**
 * On-disk layout of a workspace. Row contents are validated per table on load.
 */
export const WorkspaceSnapshotSchema = z.object({
  objects: z.array(z.unknown()).default([]),
  relationships: z.array(z.unknown()).default([]),
  locks: z.array(z.unknown()).default([]),
  presence: z.array(z.unknown()).default([]),
});

export type WorkspaceSnapshot = z.input<typeof WorkspaceSnapshotSchema>;

export interface SnapshotCounts {
  objects: number;
  relationships: number;
  locks: number;
  presence: number;
}

export async function loadSnapshot(
  tables: CollaborationTables,
  snapshot: z.output<typeof WorkspaceSnapshotSchema>
): Promise<SnapshotCounts> {
  return {
    objects: await tables.objects.load(snapshot.objects),
    relationships: await tables.relationships.load(snapshot.relationships),
    locks: await tables.locks.load(snapshot.locks),
    presence: await tables.presence.load(snapshot.presence),
  };
}

export async function dumpSnapshot(tables: CollaborationTables): Promise<{
  objects: ProjectObject[];
  relationships: Relationship[];
  locks: Lock[];
  presence: Presence[];
}> {
  return {
    objects: await tables.objects.dump(),
    relationships: await tables.relationships.dump(),
    locks: await tables.locks.dump(),
    presence: await tables.presence.dump(),
  };
}
