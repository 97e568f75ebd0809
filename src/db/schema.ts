import type Database from "better-sqlite3";
import type { Logger } from "../types";
import { withTransaction } from "./connection";
import { ActiveWorkerSummarizer } from "../services/summarizer";

/**
 * Columns added after the first release of each table. Databases created by
 * an older pool parser are upgraded in place (no table copy).
 */
const COLUMN_MIGRATIONS: Array<[table: string, column: string, definition: string]> = [
  ["workers_seen", "active", "INTEGER NOT NULL DEFAULT 1"],
  ["user_stats", "active_workers", "TEXT"],
  ["user_stats", "active_workers_count", "INTEGER DEFAULT 0"],
];

function columnNames(db: Database.Database, table: string): Set<string> {
  const rows = db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${table}')`)
    .all();
  return new Set(rows.map((r) => r.name));
}

/**
 * Create missing tables, columns and indexes.
 *
 * @returns the columns added, as "table.column"
 */
function migrateSchema(db: Database.Database, logger: Logger): string[] {
  return withTransaction(db, "Creating schema", () => {
    // Per-wallet pool stats (pool metrics owned by the ingestion layer)
    db.exec(`
      CREATE TABLE IF NOT EXISTS user_stats (
        address TEXT PRIMARY KEY,
        ts INTEGER,
        hashrate1m TEXT,
        hashrate5m TEXT,
        hashrate1hr TEXT,
        hashrate1d TEXT,
        hashrate7d TEXT,
        lastshare INTEGER,
        workers INTEGER,
        shares INTEGER,
        bestshare REAL,
        bestever REAL,
        authorised INTEGER,
        active_workers TEXT,
        active_workers_count INTEGER DEFAULT 0
      );
    `);

    // One row per wallet+worker pair
    db.exec(`
      CREATE TABLE IF NOT EXISTS workers_seen (
        wallet TEXT,
        worker TEXT,
        last_seen INTEGER,
        active INTEGER NOT NULL DEFAULT 1,
        PRIMARY KEY (wallet, worker)
      );
    `);

    const added: string[] = [];
    for (const [table, column, definition] of COLUMN_MIGRATIONS) {
      if (!columnNames(db, table).has(column)) {
        db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
        logger.info("Added column", { table, column });
        added.push(`${table}.${column}`);
      }
    }

    db.exec(`CREATE INDEX IF NOT EXISTS idx_workers_wallet ON workers_seen(wallet);`);
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_workers_active
        ON workers_seen(wallet, active, last_seen DESC);
    `);
    return added;
  });
}

/**
 * Create or upgrade the presence schema and install the summarizer triggers.
 * Every wallet's derived fields are rebuilt only when a column was added or a
 * trigger was (re)installed, since rows written before then may disagree with
 * workers_seen. On an up-to-date database nothing is written.
 *
 * @returns true when the derived fields were rebuilt
 */
export function initSchema(db: Database.Database, logger: Logger): boolean {
  const added = migrateSchema(db, logger);
  const summarizer = new ActiveWorkerSummarizer(db, logger);
  const triggersChanged = summarizer.installTriggers();

  if (added.length === 0 && !triggersChanged) {
    return false;
  }
  summarizer.rebuildAll();
  return true;
}
