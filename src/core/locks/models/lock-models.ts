/**
 * Cell Lock Models
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { IsoTimestampSchema, addMs } from "../../clock.js";

export const LockTypeSchema = z.enum(["edit", "view", "bulk"]);

export type LockType = z.infer<typeof LockTypeSchema>;

/**
 * Ordered (source, target) object pair guarded by a lock
 */
export interface ObjectPair {
  sourceObjectId: string;
  targetObjectId: string;
}

export const LockSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  sourceObjectId: z.string().min(1),
  targetObjectId: z.string().min(1),
  lockedBy: z.string().min(1),
  lockedAt: IsoTimestampSchema,
  expiresAt: IsoTimestampSchema,
  sessionId: z.string().min(1).max(255),
  lockType: LockTypeSchema,
});

export type Lock = z.infer<typeof LockSchema>;

/**
 * What a caller sends to request a cell lock
 */
export const LockRequestSchema = z.object({
  sourceObjectId: z.string().min(1),
  targetObjectId: z.string().min(1),
  sessionId: z.string().min(1).max(255),
  lockType: LockTypeSchema.default("edit"),
});

export type LockRequest = z.input<typeof LockRequestSchema>;

export interface AcquireLockRequest {
  projectId: string;
  pair: ObjectPair;
  holder: string;
  sessionId: string;
  kind: LockType;
}

export interface LockView extends Lock {
  minutesRemaining: number;
}

export function createLockRecord(request: AcquireLockRequest, now: Date, grantDurationMs: number): Lock {
  return {
    id: randomUUID(),
    projectId: request.projectId,
    sourceObjectId: request.pair.sourceObjectId,
    targetObjectId: request.pair.targetObjectId,
    lockedBy: request.holder,
    lockedAt: now.toISOString(),
    expiresAt: addMs(now, grantDurationMs).toISOString(),
    sessionId: request.sessionId,
    lockType: request.kind,
  };
}

export function toLockView(lock: Lock, now: Date): LockView {
  const remainingMs = Math.max(0, new Date(lock.expiresAt).getTime() - now.getTime());
  return {
    ...lock,
    minutesRemaining: Math.round((remainingMs / 60000) * 100) / 100,
  };
}
