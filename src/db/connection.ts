import Database from "better-sqlite3";
import type { Logger } from "../types";
import { toStorageError } from "../errors";

/** Milliseconds a connection waits on a locked database before SQLITE_BUSY */
export const BUSY_TIMEOUT_MS = 10_000;

/**
 * Open the pool database. WAL lets the pool parser keep writing while this
 * service reads; the busy timeout makes a locked database wait instead of
 * failing.
 */
export function openDatabase(path: string, logger: Logger): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(path, { timeout: BUSY_TIMEOUT_MS });
  } catch (e) {
    throw toStorageError(`Opening ${path}`, e);
  }

  try {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  } catch (e) {
    db.close();
    throw toStorageError(`Opening ${path}`, e);
  }

  logger.debug("Database opened", { path });
  return db;
}

/**
 * Run fn inside a transaction. The outermost call takes the write lock up
 * front (BEGIN IMMEDIATE), so a read-then-write such as the sweep waits on
 * other writers for the busy timeout instead of failing with SQLITE_BUSY on
 * its first write. better-sqlite3 turns nested calls into savepoints.
 * SQLite failures surface as StorageError after the rollback.
 */
export function withTransaction<T>(
  db: Database.Database,
  operation: string,
  fn: () => T
): T {
  try {
    return db.transaction(fn).immediate();
  } catch (e) {
    throw toStorageError(operation, e);
  }
}
