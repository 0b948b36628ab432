/**
 * Presence Models
 *
 * Advisory "who is looking where" records, one per (project, user).
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { IsoTimestampSchema, addMs } from "../../clock.js";

export const ActivitySchema = z.enum(["viewing", "editing", "navigating"]);

export type Activity = z.infer<typeof ActivitySchema>;

export const PresenceSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  userId: z.string().min(1),
  sessionId: z.string().min(1).max(255),
  lastSeen: IsoTimestampSchema,
  currentObjectId: z.string().nullable(),
  currentActivity: ActivitySchema,
  matrixRow: z.number().int().min(0).nullable(),
  matrixCol: z.number().int().min(0).nullable(),
});

export type Presence = z.infer<typeof PresenceSchema>;

/**
 * Body of a presence heartbeat sent by a client
 */
export const PresenceUpdateRequestSchema = z.object({
  currentObjectId: z.string().min(1).nullable().optional(),
  currentActivity: ActivitySchema.default("viewing"),
  matrixRow: z.number().int().min(0).nullable().optional(),
  matrixCol: z.number().int().min(0).nullable().optional(),
});

export type PresenceUpdateRequest = z.input<typeof PresenceUpdateRequestSchema>;

export interface HeartbeatInput {
  projectId: string;
  userId: string;
  sessionId: string;
  activity: Activity;
  currentObjectId?: string | null;
  matrixRow?: number | null;
  matrixCol?: number | null;
}

export interface PresenceView extends Presence {
  isActive: boolean;
}

export function createPresenceRecord(input: HeartbeatInput, now: Date): Presence {
  return {
    id: randomUUID(),
    projectId: input.projectId,
    userId: input.userId,
    sessionId: input.sessionId,
    lastSeen: now.toISOString(),
    currentObjectId: input.currentObjectId ?? null,
    currentActivity: input.activity,
    matrixRow: input.matrixRow ?? null,
    matrixCol: input.matrixCol ?? null,
  };
}

export function isPresenceActive(presence: Presence, now: Date, activeWindowMs: number): boolean {
  return new Date(presence.lastSeen).getTime() > addMs(now, -activeWindowMs).getTime();
}

export function toPresenceView(presence: Presence, now: Date, activeWindowMs: number): PresenceView {
  return { ...presence, isActive: isPresenceActive(presence, now, activeWindowMs) };
}
