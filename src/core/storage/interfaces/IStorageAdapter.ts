/**
 * Storage Adapter Interface
 *
 * Keyed record tables with uniqueness constraints. Collaboration components
 * depend only on these interfaces; implementations (in-memory, SQL, etc.)
 * handle engine-specific details internally.
 *
 * @module
 */

import type { z } from "zod";

// =============================================================================
// Query Types
// =============================================================================

/**
 * Comparison operators for query conditions
 */
export type ComparisonOperator =
  | "eq"  // Equal
  | "ne"  // Not equal
  | "gt"  // Greater than
  | "gte" // Greater than or equal
  | "lt"  // Less than
  | "lte" // Less than or equal
  | "in"; // Value in array

/**
 * Query condition for filtering rows. Conditions in a list are AND-ed.
 */
export interface QueryCondition<Row> {
  field: keyof Row & string;
  operator: ComparisonOperator;
  value: unknown;
}

export interface SortOrder<Row> {
  field: keyof Row & string;
  direction: "asc" | "desc";
}

export interface QueryOptions<Row> {
  orderBy?: SortOrder<Row>[];
  limit?: number;
  offset?: number;
}

// =============================================================================
// Table Definition
// =============================================================================

/**
 * Every row is addressed by a string primary key named `id`
 */
export interface BaseRow {
  id: string;
}

/**
 * Declares a table: its name, the schema rows must satisfy when loaded from
 * outside the process, and its named unique keys.
 *
 * @example
 * ```typescript
 * const LOCKS_TABLE: TableDefinition<Lock> = {
 *   name: "relationship_locks",
 *   schema: LockSchema,
 *   uniqueKeys: { pair: ["sourceObjectId", "targetObjectId"] },
 * };
 * ```
 */
export interface TableDefinition<Row extends BaseRow> {
  name: string;
  schema: z.ZodType<Row, z.ZodTypeDef, unknown>;
  uniqueKeys?: Record<string, ReadonlyArray<keyof Row & string>>;
}

// =============================================================================
// Table Interface
// =============================================================================

export interface ITable<Row extends BaseRow> {
  readonly name: string;

  /**
   * Insert a row. The uniqueness check and the write happen as one step.
   *
   * @throws UniqueConstraintError if the id or any unique key is taken
   * @throws StorageError on backend failure
   */
  insert(row: Row): Promise<Row>;

  /**
   * Insert, or replace the row currently holding the same value for the named
   * unique key. The replaced row keeps its id.
   */
  upsert(row: Row, uniqueKey: string): Promise<Row>;

  findById(id: string): Promise<Row | null>;

  findOne(conditions: QueryCondition<Row>[]): Promise<Row | null>;

  query(conditions?: QueryCondition<Row>[], options?: QueryOptions<Row>): Promise<Row[]>;

  count(conditions?: QueryCondition<Row>[]): Promise<number>;

  /**
   * Apply a partial update. Returns null if no row has this id.
   *
   * @throws UniqueConstraintError if the update collides with another row
   */
  update(id: string, patch: Partial<Omit<Row, "id">>): Promise<Row | null>;

  delete(id: string): Promise<boolean>;

  /**
   * Delete rows matching all conditions
   *
   * @returns Number of rows deleted
   */
  deleteWhere(conditions: QueryCondition<Row>[]): Promise<number>;

  /**
   * All rows, for snapshots
   */
  dump(): Promise<Row[]>;

  /**
   * Replace the table contents with externally supplied rows, validated
   * against the table schema. Nothing changes if any row is invalid.
   *
   * @throws ValidationError if a row fails the schema
   * @throws UniqueConstraintError if two rows collide
   */
  load(rows: unknown[]): Promise<number>;
}

// =============================================================================
// Storage Adapter Interface
// =============================================================================

export interface IStorageAdapter {
  /**
   * Create a table. Each name may be created once per adapter.
   */
  createTable<Row extends BaseRow>(definition: TableDefinition<Row>): ITable<Row>;

  readonly tableNames: string[];

  close(): Promise<void>;
}

export type StorageAdapterFactory = () => IStorageAdapter;
