/**
 * Presence Tracker Interface
 *
 * Liveness of users in a project. Never blocks and is never blocked by the
 * lock manager.
 */

import type { HeartbeatInput, Presence } from "../models/presence-models.js";

export interface IPresenceTracker {
  /**
   * Create or overwrite the (project, user) record with `lastSeen = now`
   */
  heartbeat(input: HeartbeatInput, now: Date): Promise<Presence>;

  /**
   * Records with `lastSeen > now - activeWindowMs`. Order is unspecified.
   */
  listActive(projectId: string, now: Date, activeWindowMs: number): Promise<Presence[]>;

  /**
   * Delete records with `lastSeen <= now - staleWindowMs` across all projects
   *
   * @returns Number of records deleted
   */
  sweepStale(now: Date, staleWindowMs: number): Promise<number>;

  /**
   * Drop a user's record explicitly (sign-out, closed tab)
   */
  leave(projectId: string, userId: string): Promise<boolean>;
}
