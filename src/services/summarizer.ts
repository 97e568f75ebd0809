import type Database from "better-sqlite3";
import type { ActiveWorkerSummary, Logger } from "../types";
import { StorageError } from "../errors";
import { withTransaction } from "../db/connection";

// ===========================================================================
// Recompute statement
//
// One upsert rebuilds both derived columns of a wallet from workers_seen.
// It runs as the body of every workers_seen trigger (walletExpr = NEW.wallet
// or OLD.wallet) and as a prepared statement (walletExpr = @wallet).
//
//   - Full recompute, never incremental: the list is always read back from
//     the rows committed in the current transaction.
//   - Missing user_stats row: inserted with every pool-metric column NULL.
//   - Existing row: only active_workers / active_workers_count change.
//   - No active workers: '[]' and 0 (json_group_array over zero rows).
//   - NULL wallet: never summarized (user_stats.address is the key).
// ===========================================================================

/**
 * Subqueries yielding the active_workers JSON and active_workers_count of
 * one wallet. Shared with the pool-metric upsert so a freshly inserted stats
 * row carries the real summary.
 */
export function activeWorkersSql(walletExpr: string): { list: string; count: string } {
  return {
    list: `(SELECT json_group_array(worker) FROM (
         SELECT worker FROM workers_seen
         WHERE wallet = ${walletExpr} AND active = 1
         ORDER BY rowid
      ))`,
    count: `(SELECT count(*) FROM workers_seen WHERE wallet = ${walletExpr} AND active = 1)`,
  };
}

function recomputeSql(walletExpr: string): string {
  const derived = activeWorkersSql(walletExpr);
  return `
    INSERT INTO user_stats (address, active_workers, active_workers_count)
    VALUES (${walletExpr}, ${derived.list}, ${derived.count})
    ON CONFLICT(address) DO UPDATE SET
      active_workers = excluded.active_workers,
      active_workers_count = excluded.active_workers_count;`;
}

/** Triggers installed by an earlier SQL migration; replaced by ours */
const LEGACY_TRIGGERS = [
  "tr_workers_seen_after_insert",
  "tr_workers_seen_after_update",
  "tr_workers_seen_after_delete",
];

const TRIGGERS: Array<[name: string, definition: string]> = [
  [
    "trg_workers_seen_insert",
    `AFTER INSERT ON workers_seen
     WHEN NEW.wallet IS NOT NULL
     BEGIN ${recomputeSql("NEW.wallet")} END`,
  ],
  [
    "trg_workers_seen_update",
    `AFTER UPDATE OF wallet, worker, active, last_seen ON workers_seen
     WHEN NEW.wallet IS NOT NULL
     BEGIN ${recomputeSql("NEW.wallet")} END`,
  ],
  // A row moved to another wallet also changes the wallet it left
  [
    "trg_workers_seen_update_moved",
    `AFTER UPDATE OF wallet ON workers_seen
     WHEN OLD.wallet IS NOT NULL AND OLD.wallet IS NOT NEW.wallet
     BEGIN ${recomputeSql("OLD.wallet")} END`,
  ],
  [
    "trg_workers_seen_delete",
    `AFTER DELETE ON workers_seen
     WHEN OLD.wallet IS NOT NULL
     BEGIN ${recomputeSql("OLD.wallet")} END`,
  ],
];

function normalizeSql(sql: string): string {
  return sql.replace(/\s+/g, " ").trim();
}

/**
 * Parse the persisted active_workers column. NULL only appears on rows
 * written before the column existed.
 */
export function parseWorkerList(raw: string | null): string[] {
  if (raw === null) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new StorageError(`active_workers is not valid JSON: ${raw}`, { cause: e });
  }
  if (!Array.isArray(parsed) || !parsed.every((w) => typeof w === "string")) {
    throw new StorageError(`active_workers is not a JSON array of strings: ${raw}`);
  }
  return parsed;
}

/**
 * ActiveWorkerSummarizer keeps user_stats.active_workers[_count] equal to
 * the active rows of workers_seen.
 *
 * The recomputation lives in SQLite triggers so it is atomic with every
 * write to workers_seen, including writes from the pool parser that never go
 * through this service. If the recompute fails, SQLite aborts the triggering
 * statement and the presence write fails with it.
 */
export class ActiveWorkerSummarizer {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Bring the workers_seen triggers up to date. Triggers whose stored
   * definition already matches are left alone, so on an up-to-date database
   * this issues no DDL.
   *
   * @returns true when a trigger was created, replaced or dropped
   */
  installTriggers(): boolean {
    const changed = withTransaction(this.db, "Installing summarizer triggers", () => {
      const existing = new Map(
        this.db
          .prepare<[], { name: string; sql: string | null }>(
            "SELECT name, sql FROM sqlite_master WHERE type = 'trigger' AND tbl_name = 'workers_seen'"
          )
          .all()
          .map((r): [string, string] => [r.name, normalizeSql(r.sql ?? "")])
      );

      const updated: string[] = [];
      for (const name of LEGACY_TRIGGERS) {
        if (existing.has(name)) {
          this.db.exec(`DROP TRIGGER IF EXISTS ${name}`);
          updated.push(name);
        }
      }
      for (const [name, definition] of TRIGGERS) {
        const stored = existing.get(name);
        if (stored !== undefined && stored.endsWith(normalizeSql(definition))) continue;
        this.db.exec(`DROP TRIGGER IF EXISTS ${name}`);
        this.db.exec(`CREATE TRIGGER ${name} ${definition}`);
        updated.push(name);
      }
      return updated;
    });

    if (changed.length > 0) {
      this.logger.info("Summarizer triggers installed", { triggers: changed });
    }
    return changed.length > 0;
  }

  /**
   * Recompute one wallet outside of a trigger
   */
  recompute(wallet: string): ActiveWorkerSummary {
    return withTransaction(this.db, `Recomputing ${wallet}`, () => {
      this.db.prepare<{ wallet: string }>(recomputeSql("@wallet")).run({ wallet });
      const summary = this.readSummary(wallet);
      if (!summary) {
        throw new StorageError(`user_stats row for ${wallet} missing after recompute`);
      }
      return summary;
    });
  }

  /**
   * Recompute every wallet known to either table. Used after migrations so
   * rows written before the triggers existed are brought in line.
   */
  rebuildAll(): number {
    const count = withTransaction(this.db, "Rebuilding active workers", () => {
      const rows = this.db
        .prepare<[], { wallet: string }>(
          `SELECT wallet FROM workers_seen WHERE wallet IS NOT NULL
           UNION
           SELECT address FROM user_stats WHERE address IS NOT NULL`
        )
        .all();
      const stmt = this.db.prepare<{ wallet: string }>(recomputeSql("@wallet"));
      for (const { wallet } of rows) {
        stmt.run({ wallet });
      }
      return rows.length;
    });
    this.logger.info("Active worker summaries rebuilt", { wallets: count });
    return count;
  }

  /**
   * Read the derived fields of a wallet, or null when it has no stats row
   */
  readSummary(wallet: string): ActiveWorkerSummary | null {
    const row = this.db
      .prepare<
        [string],
        { address: string; active_workers: string | null; active_workers_count: number | null }
      >(
        `SELECT address, active_workers, active_workers_count
         FROM user_stats WHERE address = ?`
      )
      .get(wallet);

    if (!row) return null;
    return {
      address: row.address,
      activeWorkers: parseWorkerList(row.active_workers),
      activeWorkersCount: row.active_workers_count ?? 0,
    };
  }
}
