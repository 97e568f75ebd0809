import { vi } from "vitest";
import type Database from "better-sqlite3";
import type { Env, Logger } from "../src/types";
import { DEFAULT_CONFIG } from "../src/config";
import { openDatabase, initSchema } from "../src/db";

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * Fresh in-memory pool database with the presence schema installed
 */
export function createTestDb(logger: Logger = createTestLogger()): Database.Database {
  const db = openDatabase(":memory:", logger);
  initSchema(db, logger);
  return db;
}

export function createTestEnv(db: Database.Database): Env {
  return { ...DEFAULT_CONFIG, DATABASE_PATH: ":memory:", DB: db };
}

interface StatsRow {
  address: string;
  ts: number | null;
  hashrate1m: string | null;
  workers: number | null;
  active_workers: string | null;
  active_workers_count: number | null;
}

export function readStatsRow(db: Database.Database, address: string): StatsRow | undefined {
  return db
    .prepare<[string], StatsRow>(
      `SELECT address, ts, hashrate1m, workers, active_workers, active_workers_count
       FROM user_stats WHERE address = ?`
    )
    .get(address);
}

/**
 * Count of active presence rows, computed independently of the summarizer
 */
export function countActive(db: Database.Database, wallet: string): number {
  const row = db
    .prepare<[string], { n: number }>(
      "SELECT count(*) AS n FROM workers_seen WHERE wallet = ? AND active = 1"
    )
    .get(wallet);
  return row ? row.n : 0;
}

/**
 * Make every write to user_stats fail, to exercise rollback of the
 * triggering presence write
 */
export function blockStatsWrites(db: Database.Database): void {
  db.exec(`
    CREATE TRIGGER test_block_stats_insert BEFORE INSERT ON user_stats
    BEGIN SELECT RAISE(ABORT, 'user_stats unavailable'); END;
    CREATE TRIGGER test_block_stats_update BEFORE UPDATE ON user_stats
    BEGIN SELECT RAISE(ABORT, 'user_stats unavailable'); END;
  `);
}
