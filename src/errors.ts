/**
 * Thrown when an identifier or timestamp is rejected before any row is touched
 */
export class ValidationError extends Error {
  readonly code = "INVALID_REQUEST" as const;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Thrown when SQLite fails a read or write. The transaction that raised it
 * has been rolled back, so presence rows and derived summaries still agree.
 */
export class StorageError extends Error {
  readonly code = "STORAGE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

/**
 * Type guard for errors raised by better-sqlite3 (SqliteError carries a
 * SQLITE_* result code)
 */
export function isSqliteError(e: unknown): e is Error & { code: string } {
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    e.code.startsWith("SQLITE_")
  );
}

/**
 * Re-throw SQLite failures as StorageError; anything else propagates as is
 */
export function toStorageError(operation: string, e: unknown): unknown {
  if (isSqliteError(e)) {
    return new StorageError(`${operation} failed: ${e.message}`, { cause: e });
  }
  return e;
}
