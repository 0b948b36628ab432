/**
 * CLI Tests
 *
 * Tests for workspace loading and the output of the matrix, sweep and summary
 * commands.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { openWorkspace } from "../workspace.js";
import { formatMatrixMetrics, renderMatrixGrid } from "../commands/matrix.js";
import { sweepWorkspace } from "../commands/sweep.js";
import { formatSummary } from "../commands/summary.js";
import { DEFAULT_COLLABORATION_CONFIG, ErrorCode, ManualClock, ValidationError } from "../../core/index.js";
import { readJson, writeJson } from "../../utils/index.js";

const FIXTURE = fileURLToPath(new URL("./fixtures/workspace.json", import.meta.url));

describe("CLI", () => {
  let dir: string;
  let workspacePath: string;
  let clock: ManualClock;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "nom-collab-cli-"));
    workspacePath = path.join(dir, "workspace.json");
    fs.copyFileSync(FIXTURE, workspacePath);
    clock = new ManualClock("2024-01-01T00:00:00.000Z");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function open() {
    return openWorkspace(workspacePath, { config: DEFAULT_COLLABORATION_CONFIG, clock });
  }

  describe("openWorkspace", () => {
    it("should load every table of the snapshot", async () => {
      const workspace = await open();

      expect(workspace.counts).toEqual({ objects: 3, relationships: 1, locks: 2, presence: 2 });
    });

    it("should reject a file that is not JSON", async () => {
      fs.writeFileSync(workspacePath, "not json");

      await expect(open()).rejects.toBeInstanceOf(ValidationError);
    });

    it("should reject rows that do not match the table schema", async () => {
      writeJson(workspacePath, { locks: [{ id: "lock-1" }] });

      const error = await open().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.VALIDATION_INVALID_SNAPSHOT);
        expect(error.issues).toContain("relationship_locks[0].projectId: Required");
      }
    });
  });

  describe("matrix", () => {
    it("should render the grid with relationship, lock and diagonal glyphs", async () => {
      const workspace = await open();
      const matrix = await workspace.core.facade.getMatrix("proj-1");

      expect(renderMatrixGrid(matrix)).toEqual(["  1 2 3", "A \\ ● ·", "B · \\ L", "C · · \\"]);
      expect(formatMatrixMetrics(matrix)).toBe(
        "Objects: 3  Relationships: 1  Completion: 16.67%  Active users: 1"
      );
    });

    it("should render a placeholder for an empty project", async () => {
      const workspace = await open();
      const matrix = await workspace.core.facade.getMatrix("proj-empty");

      expect(renderMatrixGrid(matrix)).toEqual(["(no objects)"]);
    });
  });

  describe("summary", () => {
    it("should list active users and locks", async () => {
      const workspace = await open();
      const summary = await workspace.core.facade.getCollaborationSummary("proj-1");

      expect(formatSummary(summary)).toEqual([
        "Active users: 1",
        "  user-1 (editing)",
        "Active locks: 1",
        "  obj-b -> obj-c by user-1 (3.00 min left)",
        "Recent changes: 1",
      ]);
    });
  });

  describe("sweep", () => {
    it("should leave the file untouched on a dry run", async () => {
      const before = fs.readFileSync(workspacePath, "utf-8");

      const result = await sweepWorkspace(workspacePath, { dryRun: true }, { config: DEFAULT_COLLABORATION_CONFIG, clock });

      expect(result).toEqual({ locks: 1, presence: 1 });
      expect(fs.readFileSync(workspacePath, "utf-8")).toBe(before);
    });

    it("should write the swept snapshot back", async () => {
      const result = await sweepWorkspace(workspacePath, {}, { config: DEFAULT_COLLABORATION_CONFIG, clock });
      expect(result).toEqual({ locks: 1, presence: 1 });

      const reopened = await open();
      expect(reopened.counts).toEqual({ objects: 3, relationships: 1, locks: 1, presence: 1 });
      expect((await reopened.core.tables.locks.dump()).map((lock) => lock.id)).toEqual(["lock-1"]);
      expect(readJson(workspacePath)).toMatchObject({ presence: [{ id: "presence-1" }] });
    });
  });
});
