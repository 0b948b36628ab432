/**
 * Matrix Assembler Tests
 *
 * Tests for matrix assembly including:
 * - Grid shape, ordering and the diagonal
 * - Completion percentage
 * - Live lock and presence state on cells
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MatrixAssembler, compareCodePoints, compareObjects } from "../impl/MatrixAssembler.js";
import { computeCompletionPercentage } from "../models/matrix-models.js";
import { createCollaborationCore, type CollaborationCore } from "../../collaboration/impl/factory.js";
import { MemoryStorageAdapter } from "../../storage/impl/MemoryStorageAdapter.js";
import { createProjectObject } from "../../relationships/models/relationship-models.js";
import { DEFAULT_COLLABORATION_CONFIG } from "../../config.js";
import { ManualClock } from "../../clock.js";

const MINUTE = 60 * 1000;

async function registerObjects(core: CollaborationCore, names: Record<string, string>): Promise<void> {
  for (const [id, name] of Object.entries(names)) {
    await core.objects.register(createProjectObject("proj-1", name, { id }));
  }
}

async function relate(core: CollaborationCore, sourceObjectId: string, targetObjectId: string): Promise<void> {
  const result = await core.facade.createRelationship("proj-1", { sourceObjectId, targetObjectId }, "user-1");
  if (!result.ok) throw result.error;
}

describe("computeCompletionPercentage", () => {
  it("should be 0 for fewer than two objects", () => {
    expect(computeCompletionPercentage(0, 0)).toBe(0);
    expect(computeCompletionPercentage(1, 0)).toBe(0);
  });

  it("should divide by the off-diagonal cell count", () => {
    expect(computeCompletionPercentage(2, 1)).toBe(50);
    expect(computeCompletionPercentage(4, 3)).toBe(25);
  });

  it("should clamp to 100", () => {
    expect(computeCompletionPercentage(2, 5)).toBe(100);
  });
});

describe("compareObjects", () => {
  it("should order by name, then id", () => {
    const objects = [
      createProjectObject("proj-1", "Order", { id: "o" }),
      createProjectObject("proj-1", "Item", { id: "i2" }),
      createProjectObject("proj-1", "Item", { id: "i1" }),
    ];

    expect(objects.sort(compareObjects).map((object) => object.id)).toEqual(["i1", "i2", "o"]);
  });

  it("should order names by code point beyond the basic plane", () => {
    const objects = [
      createProjectObject("proj-1", "\u{1F600}", { id: "emoji" }),
      createProjectObject("proj-1", "\uFF5E", { id: "tilde" }),
    ];

    expect(objects.sort(compareObjects).map((object) => object.id)).toEqual(["tilde", "emoji"]);
    expect(compareCodePoints("\u{1F600}", "\uFF5E")).toBeGreaterThan(0);
    expect(compareCodePoints("ab", "abc")).toBeLessThan(0);
    expect(compareCodePoints("same", "same")).toBe(0);
  });
});

describe("MatrixAssembler", () => {
  let clock: ManualClock;
  let core: CollaborationCore;

  beforeEach(() => {
    clock = new ManualClock();
    core = createCollaborationCore(new MemoryStorageAdapter(), DEFAULT_COLLABORATION_CONFIG, clock);
  });

  it("should assemble the three-object example", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B", "obj-c": "C" });
    await relate(core, "obj-a", "obj-b");

    const matrix = await core.matrix.assemble("proj-1", clock.now());

    expect(matrix.totalObjects).toBe(3);
    expect(matrix.totalRelationships).toBe(1);
    expect(matrix.completionPercentage).toBeCloseTo(16.67, 2);
    expect(matrix.matrixData).toHaveLength(3);
    expect(matrix.matrixData.every((row) => row.length === 3)).toBe(true);

    expect(matrix.matrixData[0]?.[1]?.relationship?.sourceObjectId).toBe("obj-a");
    expect(matrix.matrixData[1]?.[0]?.relationship).toBeNull();
    expect(matrix.matrixData[0]?.[0]?.canEdit).toBe(false);
    expect(matrix.matrixData[0]?.[0]?.isSelfReference).toBe(true);
    expect(matrix.matrixData[0]?.[1]?.canEdit).toBe(true);
  });

  it("should order rows and columns by name", async () => {
    await registerObjects(core, { "obj-1": "Order", "obj-2": "Customer", "obj-3": "Address" });

    const matrix = await core.matrix.assemble("proj-1", clock.now());

    expect(matrix.objects.map((object) => object.name)).toEqual(["Address", "Customer", "Order"]);
    expect(matrix.matrixData[2]?.[0]).toMatchObject({ sourceObjectId: "obj-1", targetObjectId: "obj-3" });
  });

  it("should summarize relationship counts per object", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B", "obj-c": "C" });
    await relate(core, "obj-a", "obj-b");
    await relate(core, "obj-a", "obj-c");
    await relate(core, "obj-c", "obj-b");

    const matrix = await core.matrix.assemble("proj-1", clock.now());

    expect(
      matrix.objects.map((object) => [object.id, object.outgoingRelationshipCount, object.incomingRelationshipCount])
    ).toEqual([
      ["obj-a", 2, 0],
      ["obj-b", 0, 2],
      ["obj-c", 1, 1],
    ]);
    expect(matrix.completionPercentage).toBe(50);
  });

  it("should return an empty grid for a project without objects", async () => {
    const matrix = await core.matrix.assemble("proj-empty", clock.now());

    expect(matrix.matrixData).toEqual([]);
    expect(matrix.totalObjects).toBe(0);
    expect(matrix.completionPercentage).toBe(0);
    expect(matrix.generatedAt).toBe("2024-01-01T00:00:00.000Z");
  });

  it("should ignore objects and relationships of other projects", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B" });
    await core.objects.register(createProjectObject("proj-2", "Z", { id: "obj-z" }));
    await relate(core, "obj-a", "obj-b");

    const matrix = await core.matrix.assemble("proj-2", clock.now());

    expect(matrix.totalObjects).toBe(1);
    expect(matrix.totalRelationships).toBe(0);
  });

  it("should mark cells with an active lock", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B" });
    await core.facade.acquireLock("proj-1", { sourceObjectId: "obj-a", targetObjectId: "obj-b", sessionId: "s1" }, "user-1");

    const locked = await core.matrix.assemble("proj-1", clock.now());
    expect(locked.matrixData[0]?.[1]).toMatchObject({ isLocked: true, lockedBy: "user-1" });
    expect(locked.matrixData[1]?.[0]).toMatchObject({ isLocked: false, lockedBy: null });

    const expired = await core.matrix.assemble("proj-1", clock.advance(5 * MINUTE));
    expect(expired.matrixData[0]?.[1]).toMatchObject({ isLocked: false, lockedBy: null });
  });

  it("should show a lock on the pair taken under another project id", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B" });
    const pair = { sourceObjectId: "obj-a", targetObjectId: "obj-b" };
    await core.locks.acquire(
      { projectId: "proj-other", pair, holder: "user-1", sessionId: "s1", kind: "edit" },
      clock.now()
    );

    const matrix = await core.matrix.assemble("proj-1", clock.now());

    expect(matrix.matrixData[0]?.[1]).toMatchObject({ isLocked: true, lockedBy: "user-1" });
    expect(await core.locks.isLocked(pair, clock.now())).toBe("user-1");
  });

  it("should place active viewers on their cell", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B" });
    await core.facade.updatePresence("proj-1", "user-2", "s2", { matrixRow: 0, matrixCol: 1 });
    await core.facade.updatePresence("proj-1", "user-3", "s3", { matrixRow: 9, matrixCol: 9 });
    await core.facade.updatePresence("proj-1", "user-4", "s4", {});

    const matrix = await core.matrix.assemble("proj-1", clock.now());

    expect(matrix.matrixData[0]?.[1]?.viewers).toEqual(["user-2"]);
    expect(matrix.matrixData.flat().flatMap((cell) => cell.viewers)).toEqual(["user-2"]);
    expect(matrix.activeUsers.map((user) => user.userId).sort()).toEqual(["user-2", "user-3", "user-4"]);
    expect(matrix.activeUsers.every((user) => user.isActive)).toBe(true);
  });

  it("should leave presence out when assembled without a tracker", async () => {
    await registerObjects(core, { "obj-a": "A", "obj-b": "B" });
    await core.facade.updatePresence("proj-1", "user-2", "s2", { matrixRow: 0, matrixCol: 1 });
    const assembler = new MatrixAssembler({
      objects: core.objects,
      relationships: core.relationships,
      locks: core.locks,
    });

    const matrix = await assembler.assemble("proj-1", clock.now());

    expect(matrix.activeUsers).toEqual([]);
    expect(matrix.matrixData[0]?.[1]?.viewers).toEqual([]);
  });
});
