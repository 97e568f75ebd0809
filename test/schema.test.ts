import { describe, it, expect } from "vitest";
import { openDatabase, initSchema } from "../src/db";
import { PresenceTracker } from "../src/services";
import { createTestDb, createTestLogger, readStatsRow } from "./helpers";

const LEGACY_SCHEMA = `
  CREATE TABLE user_stats (
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
    authorised INTEGER
  );
  CREATE TABLE workers_seen (
    wallet TEXT,
    worker TEXT,
    last_seen INTEGER,
    PRIMARY KEY (wallet, worker)
  );
`;

function triggerNames(db: ReturnType<typeof createTestDb>): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'trigger' ORDER BY name")
    .all()
    .map((r) => r.name);
}

describe("initSchema", () => {
  it("upgrades a database written by an older pool parser", () => {
    const logger = createTestLogger();
    const db = openDatabase(":memory:", logger);
    db.exec(LEGACY_SCHEMA);
    db.exec(`
      INSERT INTO user_stats (address, ts, hashrate1m, workers) VALUES ('wallet1', 900, '2T', 2);
      INSERT INTO workers_seen (wallet, worker, last_seen) VALUES ('wallet1', 'rig1', 800);
      INSERT INTO workers_seen (wallet, worker, last_seen) VALUES ('wallet1', 'rig2', 850);
      INSERT INTO workers_seen (wallet, worker, last_seen) VALUES ('wallet2', 'rigA', 850);
    `);

    expect(initSchema(db, logger)).toBe(true);

    expect(logger.info).toHaveBeenCalledWith("Added column", { table: "workers_seen", column: "active" });
    expect(logger.info).toHaveBeenCalledWith("Added column", {
      table: "user_stats",
      column: "active_workers",
    });
    expect(logger.info).toHaveBeenCalledWith("Added column", {
      table: "user_stats",
      column: "active_workers_count",
    });

    // Existing rows count as active until the first sweep
    expect(readStatsRow(db, "wallet1")).toEqual({
      address: "wallet1",
      ts: 900,
      hashrate1m: "2T",
      workers: 2,
      active_workers: '["rig1","rig2"]',
      active_workers_count: 2,
    });
    expect(readStatsRow(db, "wallet2")).toMatchObject({
      active_workers: '["rigA"]',
      active_workers_count: 1,
    });
  });

  it("keeps triggers working on an upgraded database", () => {
    const logger = createTestLogger();
    const db = openDatabase(":memory:", logger);
    db.exec(LEGACY_SCHEMA);
    initSchema(db, logger);

    new PresenceTracker(db, logger).recordSeen("wallet1", "rig1", 1000);

    expect(readStatsRow(db, "wallet1")).toMatchObject({
      active_workers: '["rig1"]',
      active_workers_count: 1,
    });
  });

  it("can run again on an up-to-date database without changing data", () => {
    const logger = createTestLogger();
    const db = createTestDb(logger);
    const tracker = new PresenceTracker(db, logger);
    tracker.recordSeen("wallet1", "rig1", 1000);
    tracker.recordDropped("wallet1", "rig2", 1010);
    const before = readStatsRow(db, "wallet1");

    expect(initSchema(db, logger)).toBe(false);

    expect(readStatsRow(db, "wallet1")).toEqual(before);
    expect(tracker.listWorkers("wallet1")).toHaveLength(2);
    expect(triggerNames(db)).toEqual([
      "trg_workers_seen_delete",
      "trg_workers_seen_insert",
      "trg_workers_seen_update",
      "trg_workers_seen_update_moved",
    ]);
    expect(logger.info).not.toHaveBeenCalledWith("Added column", expect.anything());
  });

  it("writes nothing to user_stats on an up-to-date database", () => {
    const logger = createTestLogger();
    const db = createTestDb(logger);
    new PresenceTracker(db, logger).recordSeen("wallet1", "rig1", 1000);
    db.exec(`
      CREATE TABLE stats_writes (address TEXT);
      CREATE TRIGGER test_count_stats_writes AFTER UPDATE ON user_stats
      BEGIN INSERT INTO stats_writes VALUES (NEW.address); END;
    `);

    initSchema(db, logger);
    initSchema(db, logger);

    const writes = db.prepare<[], { n: number }>("SELECT count(*) AS n FROM stats_writes").get();
    expect(writes).toEqual({ n: 0 });
  });

  it("reinstalls an outdated trigger and rebuilds the summaries", () => {
    const logger = createTestLogger();
    const db = createTestDb(logger);
    db.exec(`
      DROP TRIGGER trg_workers_seen_delete;
      CREATE TRIGGER trg_workers_seen_delete AFTER DELETE ON workers_seen
      BEGIN SELECT 1; END;
      INSERT INTO workers_seen (wallet, worker, last_seen, active) VALUES ('wallet1', 'rig1', 1000, 1);
      UPDATE user_stats SET active_workers = '[]', active_workers_count = 0 WHERE address = 'wallet1';
    `);

    expect(initSchema(db, logger)).toBe(true);

    expect(readStatsRow(db, "wallet1")).toMatchObject({
      active_workers: '["rig1"]',
      active_workers_count: 1,
    });
    db.prepare("DELETE FROM workers_seen WHERE wallet = 'wallet1'").run();
    expect(readStatsRow(db, "wallet1")).toMatchObject({
      active_workers: "[]",
      active_workers_count: 0,
    });
  });
});
