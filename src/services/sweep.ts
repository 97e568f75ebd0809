import type Database from "better-sqlite3";
import type { DemotedWorker, Logger, SweepResult } from "../types";
import { ValidationError } from "../errors";
import { withTransaction } from "../db/connection";
import { PresenceTracker, assertTimestamp } from "./presence";

/**
 * StalenessSweep demotes workers that have not been seen within the timeout.
 *
 * Rows are demoted one by one through PresenceTracker.markInactive, so each
 * demotion fires the summarizer for its wallet. The whole pass is a single
 * transaction: a failed recompute rolls back every demotion of the run.
 * Rows are never deleted; retention is left to the pool operator.
 */
export class StalenessSweep {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly tracker: PresenceTracker;

  constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
    this.tracker = new PresenceTracker(db, logger);
  }

  /**
   * Demote every active row with now - last_seen > timeoutSeconds.
   * A second call with the same now finds nothing and writes nothing.
   */
  sweep(timeoutSeconds: number, now: number): SweepResult {
    if (!Number.isInteger(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new ValidationError("timeoutSeconds must be a positive integer");
    }
    assertTimestamp("now", now);

    const demoted = withTransaction(this.db, "Sweeping stale workers", () => {
      const stale = this.db
        .prepare<[number, number], DemotedWorker>(
          `SELECT wallet, worker, last_seen AS lastSeen FROM workers_seen
           WHERE active = 1 AND (? - last_seen) > ?
           ORDER BY rowid`
        )
        .all(now, timeoutSeconds);

      return stale.filter((w) => this.tracker.markInactive(w.wallet, w.worker));
    });

    const wallets = [...new Set(demoted.map((w) => w.wallet))];
    if (demoted.length > 0) {
      this.logger.info("Stale workers demoted", {
        count: demoted.length,
        wallets,
        timeoutSeconds,
        now,
      });
    }

    return { now, timeoutSeconds, demoted, wallets };
  }
}
