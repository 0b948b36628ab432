/**
 * Presence Tracker Implementation
 *
 * Heartbeats upsert on the (project, user) unique key of the presence table,
 * so concurrent heartbeats from one user resolve to a single record with
 * last-writer-wins fields.
 */

import type { IPresenceTracker } from "../interfaces/IPresenceTracker.js";
import type { ITable } from "../../storage/interfaces/IStorageAdapter.js";
import { createPresenceRecord, type HeartbeatInput, type Presence } from "../models/presence-models.js";
import { addMs } from "../../clock.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("presence");

export const PRESENCE_USER_KEY = "projectUser";

export class PresenceTracker implements IPresenceTracker {
  private table: ITable<Presence>;

  constructor(table: ITable<Presence>) {
    this.table = table;
  }

  async heartbeat(input: HeartbeatInput, now: Date): Promise<Presence> {
    const presence = await this.table.upsert(createPresenceRecord(input, now), PRESENCE_USER_KEY);
    logger.trace(
      { projectId: presence.projectId, userId: presence.userId, activity: presence.currentActivity },
      "Heartbeat"
    );
    return presence;
  }

  async listActive(projectId: string, now: Date, activeWindowMs: number): Promise<Presence[]> {
    const threshold = addMs(now, -activeWindowMs).toISOString();
    return this.table.query([
      { field: "projectId", operator: "eq", value: projectId },
      { field: "lastSeen", operator: "gt", value: threshold },
    ]);
  }

  async sweepStale(now: Date, staleWindowMs: number): Promise<number> {
    const threshold = addMs(now, -staleWindowMs).toISOString();
    const removed = await this.table.deleteWhere([{ field: "lastSeen", operator: "lte", value: threshold }]);
    if (removed > 0) {
      logger.info({ removed }, "Swept stale presence records");
    }
    return removed;
  }

  async leave(projectId: string, userId: string): Promise<boolean> {
    const removed = await this.table.deleteWhere([
      { field: "projectId", operator: "eq", value: projectId },
      { field: "userId", operator: "eq", value: userId },
    ]);
    return removed > 0;
  }
}
