import type Database from "better-sqlite3";
import type { Logger, WorkerPresence, WorkerPresenceRow } from "../types";
import { ValidationError, StorageError, toStorageError } from "../errors";
import { withTransaction } from "../db/connection";

/**
 * Reject empty identifiers before any row is touched
 */
export function assertIdentifier(name: "wallet" | "worker", value: unknown): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${name} must be a non-empty string`);
  }
  return value;
}

/**
 * Unix seconds: a non-negative integer
 */
export function assertTimestamp(name: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer (Unix seconds)`);
  }
  return value;
}

function toPresence(row: WorkerPresenceRow): WorkerPresence {
  return {
    wallet: row.wallet,
    worker: row.worker,
    active: row.active === 1,
    lastSeen: row.last_seen,
  };
}

/**
 * PresenceTracker records observed worker activity in workers_seen.
 *
 * Every write fires the summarizer triggers inside the same transaction, so
 * user_stats.active_workers is never observed out of step with the rows here.
 */
export class PresenceTracker {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  private upsert(wallet: string, worker: string, timestamp: number, active: 0 | 1): WorkerPresence {
    return withTransaction(this.db, `Recording ${wallet}.${worker}`, () => {
      this.db
        .prepare<[string, string, number, number]>(
          `INSERT INTO workers_seen (wallet, worker, last_seen, active)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(wallet, worker) DO UPDATE SET
             last_seen = excluded.last_seen,
             active = excluded.active`
        )
        .run(wallet, worker, timestamp, active);

      const presence = this.getWorker(wallet, worker);
      if (!presence) {
        throw new StorageError(`workers_seen row for ${wallet}.${worker} missing after write`);
      }
      return presence;
    });
  }

  /**
   * Record activity: create the row or set active=1, last_seen=timestamp
   */
  recordSeen(wallet: string, worker: string, timestamp: number): WorkerPresence {
    assertIdentifier("wallet", wallet);
    assertIdentifier("worker", worker);
    assertTimestamp("timestamp", timestamp);

    const presence = this.upsert(wallet, worker, timestamp, 1);
    this.logger.debug("Worker seen", { wallet, worker, timestamp });
    return presence;
  }

  /**
   * Record a disconnect reported by the pool: the worker leaves the active
   * list now instead of at the next sweep
   */
  recordDropped(wallet: string, worker: string, timestamp: number): WorkerPresence {
    assertIdentifier("wallet", wallet);
    assertIdentifier("worker", worker);
    assertTimestamp("timestamp", timestamp);

    const presence = this.upsert(wallet, worker, timestamp, 0);
    this.logger.info("Worker dropped", { wallet, worker, timestamp });
    return presence;
  }

  /**
   * Demote one worker. Only an active row is updated, so calling this on an
   * inactive or unknown worker writes nothing and fires no recomputation.
   *
   * @returns true when the active flag flipped
   */
  markInactive(wallet: string, worker: string): boolean {
    assertIdentifier("wallet", wallet);
    assertIdentifier("worker", worker);

    const result = withTransaction(this.db, `Demoting ${wallet}.${worker}`, () =>
      this.db
        .prepare<[string, string]>(
          `UPDATE workers_seen SET active = 0
           WHERE wallet = ? AND worker = ? AND active = 1`
        )
        .run(wallet, worker)
    );
    return result.changes > 0;
  }

  /**
   * Names of the active workers of a wallet, in insertion order
   */
  activeWorkers(wallet: string): string[] {
    assertIdentifier("wallet", wallet);
    try {
      return this.db
        .prepare<[string], { worker: string }>(
          `SELECT worker FROM workers_seen
           WHERE wallet = ? AND active = 1
           ORDER BY rowid`
        )
        .all(wallet)
        .map((r) => r.worker);
    } catch (e) {
      throw toStorageError(`Reading workers of ${wallet}`, e);
    }
  }

  /**
   * Every presence row of a wallet, active or not, in insertion order
   */
  listWorkers(wallet: string): WorkerPresence[] {
    assertIdentifier("wallet", wallet);
    try {
      return this.db
        .prepare<[string], WorkerPresenceRow>(
          `SELECT wallet, worker, active, last_seen FROM workers_seen
           WHERE wallet = ?
           ORDER BY rowid`
        )
        .all(wallet)
        .map(toPresence);
    } catch (e) {
      throw toStorageError(`Reading workers of ${wallet}`, e);
    }
  }

  getWorker(wallet: string, worker: string): WorkerPresence | null {
    const row = this.db
      .prepare<[string, string], WorkerPresenceRow>(
        `SELECT wallet, worker, active, last_seen FROM workers_seen
         WHERE wallet = ? AND worker = ?`
      )
      .get(wallet, worker);
    return row ? toPresence(row) : null;
  }
}
