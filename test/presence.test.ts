import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";
import { PresenceTracker } from "../src/services";
import { ValidationError } from "../src/errors";
import { createTestDb, createTestLogger, readStatsRow } from "./helpers";

describe("PresenceTracker", () => {
  let db: Database.Database;
  let tracker: PresenceTracker;

  beforeEach(() => {
    const logger = createTestLogger();
    db = createTestDb(logger);
    tracker = new PresenceTracker(db, logger);
  });

  describe("recordSeen", () => {
    it("lists two workers of one wallet in the order they were seen", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordSeen("wallet1", "rig2", 1000);

      expect(tracker.activeWorkers("wallet1")).toEqual(["rig1", "rig2"]);
      expect(readStatsRow(db, "wallet1")).toMatchObject({
        active_workers: '["rig1","rig2"]',
        active_workers_count: 2,
      });
    });

    it("returns the stored presence row", () => {
      expect(tracker.recordSeen("wallet1", "rig1", 1000)).toEqual({
        wallet: "wallet1",
        worker: "rig1",
        active: true,
        lastSeen: 1000,
      });
    });

    it("keeps one row per wallet+worker and refreshes last_seen", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordSeen("wallet1", "rig1", 1060);

      expect(tracker.listWorkers("wallet1")).toEqual([
        { wallet: "wallet1", worker: "rig1", active: true, lastSeen: 1060 },
      ]);
    });

    it("reactivates an inactive worker in its original position", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordSeen("wallet1", "rig2", 1000);
      tracker.markInactive("wallet1", "rig1");
      expect(tracker.activeWorkers("wallet1")).toEqual(["rig2"]);

      tracker.recordSeen("wallet1", "rig1", 1100);
      expect(tracker.activeWorkers("wallet1")).toEqual(["rig1", "rig2"]);
    });

    it("keeps wallets apart", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordSeen("wallet2", "rig1", 1000);

      expect(tracker.activeWorkers("wallet1")).toEqual(["rig1"]);
      expect(tracker.activeWorkers("wallet2")).toEqual(["rig1"]);
    });

    it.each<[string, string, number, string]>([
      ["", "rig1", 1000, "wallet must be a non-empty string"],
      ["   ", "rig1", 1000, "wallet must be a non-empty string"],
      ["wallet1", "", 1000, "worker must be a non-empty string"],
      ["wallet1", "rig1", -1, "timestamp must be a non-negative integer (Unix seconds)"],
      ["wallet1", "rig1", 1.5, "timestamp must be a non-negative integer (Unix seconds)"],
    ])("rejects (%j, %j, %j) before touching any row", (wallet, worker, ts, message) => {
      expect(() => tracker.recordSeen(wallet, worker, ts)).toThrow(ValidationError);
      expect(() => tracker.recordSeen(wallet, worker, ts)).toThrow(message);

      const rows = db.prepare<[], { n: number }>("SELECT count(*) AS n FROM workers_seen").get();
      expect(rows).toEqual({ n: 0 });
      const stats = db.prepare<[], { n: number }>("SELECT count(*) AS n FROM user_stats").get();
      expect(stats).toEqual({ n: 0 });
    });
  });

  describe("recordDropped", () => {
    it("removes the worker from the active list at once", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordSeen("wallet1", "rig2", 1000);

      const presence = tracker.recordDropped("wallet1", "rig1", 1030);

      expect(presence).toEqual({ wallet: "wallet1", worker: "rig1", active: false, lastSeen: 1030 });
      expect(tracker.activeWorkers("wallet1")).toEqual(["rig2"]);
      expect(readStatsRow(db, "wallet1")).toMatchObject({
        active_workers: '["rig2"]',
        active_workers_count: 1,
      });
    });
  });

  describe("markInactive", () => {
    it("returns true only when the flag flips", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);

      expect(tracker.markInactive("wallet1", "rig1")).toBe(true);
      expect(tracker.markInactive("wallet1", "rig1")).toBe(false);
      expect(tracker.markInactive("wallet1", "unknown")).toBe(false);
    });

    it("does not touch user_stats when nothing flips", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.markInactive("wallet1", "rig1");
      db.exec(`
        CREATE TABLE stats_writes (address TEXT);
        CREATE TRIGGER test_count_stats_writes AFTER UPDATE ON user_stats
        BEGIN INSERT INTO stats_writes VALUES (NEW.address); END;
      `);

      tracker.markInactive("wallet1", "rig1");

      const writes = db.prepare<[], { n: number }>("SELECT count(*) AS n FROM stats_writes").get();
      expect(writes).toEqual({ n: 0 });
    });
  });

  describe("listWorkers", () => {
    it("returns active and inactive rows in insertion order", () => {
      tracker.recordSeen("wallet1", "rig1", 1000);
      tracker.recordDropped("wallet1", "rig2", 1010);
      tracker.recordSeen("wallet1", "rig3", 1020);

      expect(tracker.listWorkers("wallet1")).toEqual([
        { wallet: "wallet1", worker: "rig1", active: true, lastSeen: 1000 },
        { wallet: "wallet1", worker: "rig2", active: false, lastSeen: 1010 },
        { wallet: "wallet1", worker: "rig3", active: true, lastSeen: 1020 },
      ]);
    });

    it("returns an empty list for an unknown wallet", () => {
      expect(tracker.listWorkers("nobody")).toEqual([]);
      expect(tracker.activeWorkers("nobody")).toEqual([]);
    });
  });
});
