/**
 * Storage Tests
 *
 * Tests for the in-memory storage adapter including:
 * - Unique key enforcement
 * - Filtered, sorted and paged queries
 * - Upserts and partial updates
 * - Snapshot loading and validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { MemoryStorageAdapter, MemoryTable } from "../impl/MemoryStorageAdapter.js";
import type { TableDefinition } from "../interfaces/IStorageAdapter.js";
import { dumpSnapshot, loadSnapshot, openCollaborationTables, WorkspaceSnapshotSchema } from "../tables.js";
import {
  ErrorCode,
  StorageError,
  UniqueConstraintError,
  ValidationError,
} from "../../errors.js";
import { createProjectObject } from "../../relationships/models/relationship-models.js";

const ItemSchema = z.object({
  id: z.string(),
  group: z.string(),
  name: z.string(),
  rank: z.number().nullable(),
});

type Item = z.infer<typeof ItemSchema>;

const ITEMS: TableDefinition<Item> = {
  name: "items",
  schema: ItemSchema,
  uniqueKeys: { groupName: ["group", "name"] },
};

function item(id: string, group: string, name: string, rank: number | null = null): Item {
  return { id, group, name, rank };
}

// =============================================================================
// Memory Table Tests
// =============================================================================

describe("MemoryTable", () => {
  let table: MemoryTable<Item>;

  beforeEach(() => {
    table = new MemoryTable(ITEMS);
  });

  describe("insert", () => {
    it("should store a copy of the row", async () => {
      const row = item("i1", "g1", "alpha", 1);
      await table.insert(row);
      row.name = "changed";

      const stored = await table.findById("i1");
      expect(stored?.name).toBe("alpha");
    });

    it("should reject a second row with the same unique key", async () => {
      await table.insert(item("i1", "g1", "alpha"));

      await expect(table.insert(item("i2", "g1", "alpha"))).rejects.toBeInstanceOf(UniqueConstraintError);
      expect(await table.count()).toBe(1);
    });

    it("should name the violated constraint", async () => {
      await table.insert(item("i1", "g1", "alpha"));

      const error = await table.insert(item("i2", "g1", "alpha")).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(UniqueConstraintError);
      if (error instanceof UniqueConstraintError) {
        expect(error.table).toBe("items");
        expect(error.constraint).toBe("groupName");
        expect(error.code).toBe(ErrorCode.STORAGE_UNIQUE_VIOLATION);
      }
    });

    it("should reject a duplicate id", async () => {
      await table.insert(item("i1", "g1", "alpha"));

      const error = await table.insert(item("i1", "g2", "beta")).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(UniqueConstraintError);
      if (error instanceof UniqueConstraintError) {
        expect(error.constraint).toBe("primary");
      }
    });

    it("should allow the same name in different groups", async () => {
      await table.insert(item("i1", "g1", "alpha"));
      await table.insert(item("i2", "g2", "alpha"));

      expect(await table.count()).toBe(2);
    });
  });

  describe("query", () => {
    beforeEach(async () => {
      await table.insert(item("i1", "g1", "alpha", 3));
      await table.insert(item("i2", "g1", "beta", 1));
      await table.insert(item("i3", "g2", "gamma", 2));
      await table.insert(item("i4", "g1", "delta", null));
    });

    it("should AND conditions together", async () => {
      const rows = await table.query([
        { field: "group", operator: "eq", value: "g1" },
        { field: "rank", operator: "gte", value: 2 },
      ]);

      expect(rows.map((row) => row.id)).toEqual(["i1"]);
    });

    it("should never match a null value with a range operator", async () => {
      const rows = await table.query([{ field: "rank", operator: "lt", value: 100 }]);

      expect(rows.map((row) => row.id).sort()).toEqual(["i1", "i2", "i3"]);
    });

    it("should support ne and in", async () => {
      const notG1 = await table.query([{ field: "group", operator: "ne", value: "g1" }]);
      const picked = await table.query([{ field: "name", operator: "in", value: ["beta", "gamma"] }]);

      expect(notG1.map((row) => row.id)).toEqual(["i3"]);
      expect(picked.map((row) => row.id).sort()).toEqual(["i2", "i3"]);
    });

    it("should sort, then apply offset and limit", async () => {
      const rows = await table.query([], {
        orderBy: [{ field: "name", direction: "asc" }],
        offset: 1,
        limit: 2,
      });

      expect(rows.map((row) => row.name)).toEqual(["beta", "delta"]);
    });

    it("should break ties with later sort keys", async () => {
      const rows = await table.query([{ field: "group", operator: "eq", value: "g1" }], {
        orderBy: [
          { field: "group", direction: "asc" },
          { field: "id", direction: "desc" },
        ],
      });

      expect(rows.map((row) => row.id)).toEqual(["i4", "i2", "i1"]);
    });

    it("should count matching rows", async () => {
      expect(await table.count([{ field: "group", operator: "eq", value: "g1" }])).toBe(3);
      expect(await table.count()).toBe(4);
    });
  });

  describe("upsert", () => {
    it("should insert when the key is free", async () => {
      const row = await table.upsert(item("i1", "g1", "alpha", 1), "groupName");

      expect(row.id).toBe("i1");
      expect(await table.count()).toBe(1);
    });

    it("should overwrite the existing row and keep its id", async () => {
      await table.upsert(item("i1", "g1", "alpha", 1), "groupName");
      const row = await table.upsert(item("i9", "g1", "alpha", 7), "groupName");

      expect(row).toEqual(item("i1", "g1", "alpha", 7));
      expect(await table.count()).toBe(1);
      expect(await table.findById("i9")).toBeNull();
    });

    it("should reject an unknown unique key", async () => {
      await expect(table.upsert(item("i1", "g1", "alpha"), "nope")).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe("update and delete", () => {
    beforeEach(async () => {
      await table.insert(item("i1", "g1", "alpha", 1));
      await table.insert(item("i2", "g1", "beta", 2));
    });

    it("should merge a partial update", async () => {
      const updated = await table.update("i1", { rank: 10 });

      expect(updated).toEqual(item("i1", "g1", "alpha", 10));
    });

    it("should return null when updating a missing row", async () => {
      expect(await table.update("missing", { rank: 1 })).toBeNull();
    });

    it("should move the unique index entry on update", async () => {
      await table.update("i1", { name: "omega" });

      await table.insert(item("i3", "g1", "alpha"));
      await expect(table.insert(item("i4", "g1", "omega"))).rejects.toBeInstanceOf(UniqueConstraintError);
    });

    it("should reject an update that collides with another row", async () => {
      await expect(table.update("i2", { name: "alpha" })).rejects.toBeInstanceOf(UniqueConstraintError);
      expect((await table.findById("i2"))?.name).toBe("beta");
    });

    it("should free the unique key on delete", async () => {
      expect(await table.delete("i1")).toBe(true);
      expect(await table.delete("i1")).toBe(false);

      await table.insert(item("i3", "g1", "alpha"));
      expect(await table.count()).toBe(2);
    });

    it("should delete every matching row", async () => {
      const removed = await table.deleteWhere([{ field: "rank", operator: "lte", value: 2 }]);

      expect(removed).toBe(2);
      expect(await table.count()).toBe(0);
    });
  });

  describe("load", () => {
    it("should replace the contents with validated rows", async () => {
      await table.insert(item("old", "g1", "old"));

      const loaded = await table.load([item("i1", "g1", "alpha", 1), item("i2", "g2", "beta", null)]);

      expect(loaded).toBe(2);
      expect(await table.findById("old")).toBeNull();
      expect((await table.dump()).map((row) => row.id).sort()).toEqual(["i1", "i2"]);
    });

    it("should report every invalid row", async () => {
      const error = await table
        .load([item("i1", "g1", "alpha"), { id: "i2", group: "g1", name: "beta", rank: "high" }])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_SNAPSHOT);
        expect(error.issues).toEqual(["items[1].rank: Expected number, received string"]);
      }
    });

    it("should keep the previous contents when loaded rows collide", async () => {
      await table.insert(item("old", "g1", "old"));

      await expect(
        table.load([item("i1", "g1", "alpha"), item("i2", "g1", "alpha")])
      ).rejects.toBeInstanceOf(UniqueConstraintError);

      expect((await table.dump()).map((row) => row.id)).toEqual(["old"]);
      await expect(table.insert(item("i3", "g1", "old"))).rejects.toBeInstanceOf(UniqueConstraintError);
    });
  });
});

// =============================================================================
// Adapter Tests
// =============================================================================

describe("MemoryStorageAdapter", () => {
  it("should create each table once", () => {
    const adapter = new MemoryStorageAdapter();
    adapter.createTable(ITEMS);

    expect(adapter.tableNames).toEqual(["items"]);
    expect(() => adapter.createTable(ITEMS)).toThrow(StorageError);
  });

  it("should open the collaboration tables", () => {
    const adapter = new MemoryStorageAdapter();
    openCollaborationTables(adapter);

    expect(adapter.tableNames).toEqual(["objects", "relationships", "relationship_locks", "user_presence"]);
  });

  it("should forget its tables on close", async () => {
    const adapter = new MemoryStorageAdapter();
    adapter.createTable(ITEMS);
    await adapter.close();

    expect(adapter.tableNames).toEqual([]);
  });
});

// =============================================================================
// Snapshot Tests
// =============================================================================

describe("Workspace snapshots", () => {
  it("should default missing sections to empty", () => {
    const parsed = WorkspaceSnapshotSchema.parse({ objects: [] });

    expect(parsed).toEqual({ objects: [], relationships: [], locks: [], presence: [] });
  });

  it("should load a snapshot and dump it back", async () => {
    const tables = openCollaborationTables(new MemoryStorageAdapter());
    const customer = createProjectObject("proj-1", "Customer", { id: "obj-customer" });

    const counts = await loadSnapshot(
      tables,
      WorkspaceSnapshotSchema.parse({ objects: [{ id: "obj-customer", projectId: "proj-1", name: "Customer" }] })
    );

    expect(counts).toEqual({ objects: 1, relationships: 0, locks: 0, presence: 0 });
    expect(await dumpSnapshot(tables)).toEqual({
      objects: [customer],
      relationships: [],
      locks: [],
      presence: [],
    });
  });

  it("should normalize timestamps on load", async () => {
    const tables = openCollaborationTables(new MemoryStorageAdapter());

    await tables.presence.load([
      {
        id: "p1",
        projectId: "proj-1",
        userId: "user-1",
        sessionId: "session-1",
        lastSeen: "2024-01-01T01:00:00+01:00",
        currentObjectId: null,
        currentActivity: "viewing",
        matrixRow: null,
        matrixCol: null,
      },
    ]);

    expect((await tables.presence.findById("p1"))?.lastSeen).toBe("2024-01-01T00:00:00.000Z");
  });
});
