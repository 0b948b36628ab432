/**
 * Lock Manager Interface
 *
 * Short-lived exclusive locks on matrix cells, keyed by object pair. At most
 * one unexpired lock exists per pair; an expired lock counts as absent at
 * every read, whether or not a sweep has removed it yet.
 */

import type { Result } from "../../../types/result.js";
import type { ConflictError } from "../../errors.js";
import type { AcquireLockRequest, Lock, ObjectPair } from "../models/lock-models.js";

export interface ILockManager {
  /** Fixed lifetime given to every lock */
  readonly grantDurationMs: number;

  /**
   * Grant a lock expiring at `now + grantDurationMs`, or report a conflict if
   * an unexpired lock holds the pair. A holder re-acquiring its own pair also
   * gets a conflict; extending means release then acquire.
   */
  acquire(request: AcquireLockRequest, now: Date): Promise<Result<Lock, ConflictError>>;

  /**
   * Remove a lock held by `holder`. Returns false when the lock is missing or
   * held by someone else.
   */
  release(lockId: string, holder: string): Promise<boolean>;

  /**
   * Physically remove every lock with `expiresAt <= now`
   *
   * @returns Number of locks removed
   */
  sweepExpired(now: Date): Promise<number>;

  /**
   * Holder of the unexpired lock on the pair, or null
   */
  isLocked(pair: ObjectPair, now: Date): Promise<string | null>;

  /**
   * Unexpired locks, optionally limited to a project
   */
  listActive(now: Date, projectId?: string): Promise<Lock[]>;
}
