/**
 * Collaboration Sweeper
 *
 * Periodically removes expired locks and stale presence records. Reads never
 * depend on it having run: expiry and liveness are filtered at query time.
 */

import type { ILockManager } from "../../locks/interfaces/ILockManager.js";
import type { IPresenceTracker } from "../../presence/interfaces/IPresenceTracker.js";
import type { CollaborationConfig } from "../../config.js";
import { systemClock, type Clock } from "../../clock.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("sweeper");

export interface SweepResult {
  locks: number;
  presence: number;
}

export interface CollaborationSweeperDeps {
  locks: ILockManager;
  presence: IPresenceTracker;
  config: Pick<CollaborationConfig, "sweepIntervalMs" | "presenceStaleWindowMs">;
  clock?: Clock;
}

export class CollaborationSweeper {
  private deps: CollaborationSweeperDeps;
  private clock: Clock;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: CollaborationSweeperDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  async runOnce(now: Date = this.clock.now()): Promise<SweepResult> {
    const [locks, presence] = await Promise.all([
      this.deps.locks.sweepExpired(now),
      this.deps.presence.sweepStale(now, this.deps.config.presenceStaleWindowMs),
    ]);

    if (locks > 0 || presence > 0) {
      logger.info({ locks, presence }, "Sweep completed");
    }
    return { locks, presence };
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(async () => {
      try {
        await this.runOnce();
      } catch (error) {
        logger.error({ err: error }, "Sweep failed");
      }
    }, this.deps.config.sweepIntervalMs);
    this.timer.unref();

    logger.debug({ intervalMs: this.deps.config.sweepIntervalMs }, "Sweeper started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.debug("Sweeper stopped");
  }
}
