/**
 * In-Memory Storage Adapter
 *
 * Map-backed tables with unique indexes. Each write checks its constraints and
 * applies the change without yielding to the event loop, so racing callers in
 * the same process serialize on the unique keys exactly as they would on a
 * database constraint.
 *
 * @module
 */

import type {
  BaseRow,
  IStorageAdapter,
  ITable,
  QueryCondition,
  QueryOptions,
  SortOrder,
  TableDefinition,
} from "../interfaces/IStorageAdapter.js";
import {
  ErrorCode,
  StorageError,
  UniqueConstraintError,
  ValidationError,
} from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("memory-storage");

const PRIMARY_KEY = "primary";

// =============================================================================
// Value Comparison
// =============================================================================

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function matchesCondition<Row>(row: Row, condition: QueryCondition<Row>): boolean {
  const actual: unknown = row[condition.field];
  const expected = condition.value;

  if (condition.operator === "eq") return actual === expected;
  if (condition.operator === "ne") return actual !== expected;
  if (condition.operator === "in") return Array.isArray(expected) && expected.includes(actual);

  // Range operators never match a missing value
  if (actual === undefined || actual === null || expected === undefined || expected === null) {
    return false;
  }
  const order = compareValues(actual, expected);
  switch (condition.operator) {
    case "gt":
      return order > 0;
    case "gte":
      return order >= 0;
    case "lt":
      return order < 0;
    case "lte":
      return order <= 0;
  }
}

function matchesAll<Row>(row: Row, conditions: QueryCondition<Row>[]): boolean {
  return conditions.every((condition) => matchesCondition(row, condition));
}

function sortRows<Row>(rows: Row[], orderBy: SortOrder<Row>[]): Row[] {
  return rows.sort((a, b) => {
    for (const order of orderBy) {
      const result = compareValues(a[order.field], b[order.field]);
      if (result !== 0) {
        return order.direction === "asc" ? result : -result;
      }
    }
    return 0;
  });
}

// =============================================================================
// Memory Table
// =============================================================================

export class MemoryTable<Row extends BaseRow> implements ITable<Row> {
  readonly name: string;
  private readonly definition: TableDefinition<Row>;
  private rows = new Map<string, Row>();
  /** constraint name -> serialized key -> row id */
  private indexes = new Map<string, Map<string, string>>();

  constructor(definition: TableDefinition<Row>) {
    this.name = definition.name;
    this.definition = definition;
    for (const constraint of Object.keys(definition.uniqueKeys ?? {})) {
      this.indexes.set(constraint, new Map());
    }
  }

  async insert(row: Row): Promise<Row> {
    this.insertSync(row);
    return structuredClone(row);
  }

  async upsert(row: Row, uniqueKey: string): Promise<Row> {
    const index = this.indexes.get(uniqueKey);
    if (!index) {
      throw new StorageError(`Unknown unique key ${uniqueKey}`, ErrorCode.STORAGE_FAILED, {
        table: this.name,
      });
    }

    const existingId = index.get(this.keyFor(row, uniqueKey));
    if (existingId === undefined) {
      this.insertSync(row);
      return structuredClone(row);
    }

    const replacement: Row = { ...row, id: existingId };
    this.replaceSync(existingId, replacement);
    return structuredClone(replacement);
  }

  async findById(id: string): Promise<Row | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async findOne(conditions: QueryCondition<Row>[]): Promise<Row | null> {
    for (const row of this.rows.values()) {
      if (matchesAll(row, conditions)) {
        return structuredClone(row);
      }
    }
    return null;
  }

  async query(conditions: QueryCondition<Row>[] = [], options: QueryOptions<Row> = {}): Promise<Row[]> {
    let matched = this.select(conditions);

    if (options.orderBy && options.orderBy.length > 0) {
      matched = sortRows(matched, options.orderBy);
    }

    const offset = options.offset ?? 0;
    const end = options.limit !== undefined ? offset + options.limit : undefined;
    return matched.slice(offset, end).map((row) => structuredClone(row));
  }

  async count(conditions: QueryCondition<Row>[] = []): Promise<number> {
    return this.select(conditions).length;
  }

  async update(id: string, patch: Partial<Omit<Row, "id">>): Promise<Row | null> {
    const existing = this.rows.get(id);
    if (!existing) return null;

    const updated: Row = { ...existing, ...patch, id };
    this.replaceSync(id, updated);
    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.deleteSync(id);
  }

  async deleteWhere(conditions: QueryCondition<Row>[]): Promise<number> {
    const doomed = this.select(conditions);
    let deleted = 0;
    for (const row of doomed) {
      if (this.deleteSync(row.id)) deleted++;
    }
    return deleted;
  }

  async dump(): Promise<Row[]> {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }

  async load(rows: unknown[]): Promise<number> {
    const parsed: Row[] = [];
    const issues: string[] = [];

    rows.forEach((raw, position) => {
      const result = this.definition.schema.safeParse(raw);
      if (result.success) {
        parsed.push(result.data);
      } else {
        for (const issue of result.error.issues) {
          issues.push(`${this.name}[${position}].${issue.path.join(".")}: ${issue.message}`);
        }
      }
    });

    if (issues.length > 0) {
      throw new ValidationError(`Invalid rows for table ${this.name}`, ErrorCode.VALIDATION_INVALID_SNAPSHOT, {
        issues,
      });
    }

    const previousRows = this.rows;
    const previousIndexes = this.indexes;
    this.clear();
    try {
      for (const row of parsed) {
        this.insertSync(row);
      }
    } catch (error) {
      this.rows = previousRows;
      this.indexes = previousIndexes;
      throw error;
    }

    logger.debug({ table: this.name, rows: parsed.length }, "Loaded table contents");
    return parsed.length;
  }

  clear(): void {
    this.rows = new Map();
    const fresh = new Map<string, Map<string, string>>();
    for (const constraint of this.indexes.keys()) {
      fresh.set(constraint, new Map());
    }
    this.indexes = fresh;
  }

  // ===========================================================================
  // Synchronous internals (no await between check and write)
  // ===========================================================================

  private select(conditions: QueryCondition<Row>[]): Row[] {
    const matched: Row[] = [];
    for (const row of this.rows.values()) {
      if (matchesAll(row, conditions)) matched.push(row);
    }
    return matched;
  }

  private keyFor(row: Row, constraint: string): string {
    const fields = this.definition.uniqueKeys?.[constraint] ?? [];
    return JSON.stringify(fields.map((field) => row[field] ?? null));
  }

  private assertKeysFree(row: Row, ignoreId?: string): void {
    for (const [constraint, index] of this.indexes) {
      const holder = index.get(this.keyFor(row, constraint));
      if (holder !== undefined && holder !== ignoreId) {
        throw new UniqueConstraintError(this.name, constraint, { conflictingId: holder });
      }
    }
  }

  private insertSync(row: Row): void {
    if (this.rows.has(row.id)) {
      throw new UniqueConstraintError(this.name, PRIMARY_KEY, { conflictingId: row.id });
    }
    this.assertKeysFree(row);

    const stored = structuredClone(row);
    this.rows.set(stored.id, stored);
    for (const [constraint, index] of this.indexes) {
      index.set(this.keyFor(stored, constraint), stored.id);
    }
  }

  private replaceSync(id: string, replacement: Row): void {
    const existing = this.rows.get(id);
    if (!existing) {
      this.insertSync(replacement);
      return;
    }
    this.assertKeysFree(replacement, id);

    for (const [constraint, index] of this.indexes) {
      index.delete(this.keyFor(existing, constraint));
    }
    const stored = structuredClone(replacement);
    this.rows.set(id, stored);
    for (const [constraint, index] of this.indexes) {
      index.set(this.keyFor(stored, constraint), id);
    }
  }

  private deleteSync(id: string): boolean {
    const existing = this.rows.get(id);
    if (!existing) return false;

    this.rows.delete(id);
    for (const [constraint, index] of this.indexes) {
      const key = this.keyFor(existing, constraint);
      if (index.get(key) === id) index.delete(key);
    }
    return true;
  }
}

// =============================================================================
// Memory Storage Adapter
// =============================================================================

/**
 * Storage adapter keeping every table in process memory. Used by tests and by
 * the CLI, which loads and saves JSON snapshots around it.
 */
export class MemoryStorageAdapter implements IStorageAdapter {
  private tables = new Map<string, { clear(): void }>();

  createTable<Row extends BaseRow>(definition: TableDefinition<Row>): ITable<Row> {
    if (this.tables.has(definition.name)) {
      throw new StorageError(`Table ${definition.name} already exists`, ErrorCode.STORAGE_FAILED, {
        table: definition.name,
      });
    }

    const table = new MemoryTable(definition);
    this.tables.set(definition.name, table);
    logger.debug({ table: definition.name }, "Created table");
    return table;
  }

  get tableNames(): string[] {
    return [...this.tables.keys()];
  }

  async close(): Promise<void> {
    for (const table of this.tables.values()) {
      table.clear();
    }
    this.tables.clear();
  }
}
