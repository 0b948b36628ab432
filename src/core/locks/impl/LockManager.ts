/**
 * Lock Manager Implementation
 *
 * Grants cell locks through the pair unique key of the locks table: the
 * insert either wins the key or fails with a constraint violation, which
 * becomes a conflict. Expiry is a query filter at every read; sweeping only
 * reclaims space.
 *
 * @module
 */

import type { ILockManager } from "../interfaces/ILockManager.js";
import type { ITable, QueryCondition } from "../../storage/interfaces/IStorageAdapter.js";
import {
  createLockRecord,
  type AcquireLockRequest,
  type Lock,
  type ObjectPair,
} from "../models/lock-models.js";
import { err, ok, type Result } from "../../../types/result.js";
import {
  ConflictError,
  ErrorCode,
  isUniqueConstraintError,
  wrapStorageError,
} from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("lock-manager");

export const DEFAULT_LOCK_GRANT_DURATION_MS = 5 * 60 * 1000;

function pairConditions(pair: ObjectPair): QueryCondition<Lock>[] {
  return [
    { field: "sourceObjectId", operator: "eq", value: pair.sourceObjectId },
    { field: "targetObjectId", operator: "eq", value: pair.targetObjectId },
  ];
}

export class LockManager implements ILockManager {
  readonly grantDurationMs: number;
  private table: ITable<Lock>;

  constructor(table: ITable<Lock>, grantDurationMs: number = DEFAULT_LOCK_GRANT_DURATION_MS) {
    this.table = table;
    this.grantDurationMs = grantDurationMs;
  }

  async acquire(request: AcquireLockRequest, now: Date): Promise<Result<Lock, ConflictError>> {
    const nowIso = now.toISOString();
    const lock = createLockRecord(request, now, this.grantDurationMs);

    try {
      // An expired record still occupies the pair key until removed
      const reclaimed = await this.table.deleteWhere([
        ...pairConditions(request.pair),
        { field: "expiresAt", operator: "lte", value: nowIso },
      ]);
      if (reclaimed > 0) {
        logger.debug({ pair: request.pair, reclaimed }, "Replaced expired lock");
      }

      await this.table.insert(lock);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        logger.debug({ pair: request.pair, requestedBy: request.holder }, "Lock conflict");
        return err(
          new ConflictError("Cell is already locked by another editor", ErrorCode.CONFLICT_LOCK_HELD, {
            projectId: request.projectId,
            sourceObjectId: request.pair.sourceObjectId,
            targetObjectId: request.pair.targetObjectId,
          })
        );
      }
      logger.error({ err: error, pair: request.pair }, "Lock acquisition failed");
      throw wrapStorageError(error, "Failed to acquire lock", { table: this.table.name });
    }

    logger.info(
      { lockId: lock.id, pair: request.pair, holder: lock.lockedBy, expiresAt: lock.expiresAt },
      "Lock granted"
    );
    return ok(lock);
  }

  async release(lockId: string, holder: string): Promise<boolean> {
    const lock = await this.table.findById(lockId);
    if (!lock || lock.lockedBy !== holder) {
      logger.debug({ lockId, holder }, "Release ignored: lock missing or held by another user");
      return false;
    }

    const released = await this.table.delete(lockId);
    if (released) {
      logger.info({ lockId, holder }, "Lock released");
    }
    return released;
  }

  async sweepExpired(now: Date): Promise<number> {
    const removed = await this.table.deleteWhere([
      { field: "expiresAt", operator: "lte", value: now.toISOString() },
    ]);
    if (removed > 0) {
      logger.info({ removed }, "Swept expired locks");
    }
    return removed;
  }

  async isLocked(pair: ObjectPair, now: Date): Promise<string | null> {
    const lock = await this.table.findOne([
      ...pairConditions(pair),
      { field: "expiresAt", operator: "gt", value: now.toISOString() },
    ]);
    return lock ? lock.lockedBy : null;
  }

  async listActive(now: Date, projectId?: string): Promise<Lock[]> {
    const conditions: QueryCondition<Lock>[] = [
      { field: "expiresAt", operator: "gt", value: now.toISOString() },
    ];
    if (projectId !== undefined) {
      conditions.push({ field: "projectId", operator: "eq", value: projectId });
    }
    return this.table.query(conditions, { orderBy: [{ field: "lockedAt", direction: "asc" }] });
  }
}
