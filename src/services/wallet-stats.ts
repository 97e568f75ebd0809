import type Database from "better-sqlite3";
import type {
  Logger,
  PoolMetricName,
  PoolMetricsInput,
  WalletStats,
  WalletStatsRow,
} from "../types";
import { ValidationError, StorageError, toStorageError } from "../errors";
import { withTransaction } from "../db/connection";
import { activeWorkersSql, parseWorkerList } from "./summarizer";
import { assertIdentifier } from "./presence";

type MetricKind = "integer" | "real" | "text";

/**
 * Pool-metric columns of user_stats and the values each accepts
 */
const METRIC_COLUMNS: Record<PoolMetricName, MetricKind> = {
  ts: "integer",
  hashrate1m: "text",
  hashrate5m: "text",
  hashrate1hr: "text",
  hashrate1d: "text",
  hashrate7d: "text",
  lastshare: "integer",
  workers: "integer",
  shares: "integer",
  bestshare: "real",
  bestever: "real",
  authorised: "integer",
};

const METRIC_NAMES: PoolMetricName[] = [
  "ts",
  "hashrate1m",
  "hashrate5m",
  "hashrate1hr",
  "hashrate1d",
  "hashrate7d",
  "lastshare",
  "workers",
  "shares",
  "bestshare",
  "bestever",
  "authorised",
];

const SELECT_COLUMNS = ["address", ...METRIC_NAMES, "active_workers", "active_workers_count"].join(
  ", "
);

function isMetricName(key: string): key is PoolMetricName {
  return Object.prototype.hasOwnProperty.call(METRIC_COLUMNS, key);
}

function checkMetric(name: PoolMetricName, value: unknown): string | number | null {
  if (value === null) return null;
  switch (METRIC_COLUMNS[name]) {
    case "text":
      if (typeof value === "string") return value;
      break;
    case "integer":
      if (typeof value === "number" && Number.isInteger(value)) return value;
      break;
    case "real":
      if (typeof value === "number" && Number.isFinite(value)) return value;
      break;
  }
  throw new ValidationError(`${name} must be ${METRIC_COLUMNS[name]} or null`);
}

/**
 * Validate an ingestion payload. Only pool-metric keys are accepted; the
 * derived active-worker fields cannot be written through this path.
 */
export function parsePoolMetrics(input: unknown): PoolMetricsInput {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ValidationError("Pool metrics must be a JSON object");
  }
  const metrics: PoolMetricsInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (!isMetricName(key)) {
      throw new ValidationError(`Unknown pool metric: ${key}`);
    }
    metrics[key] = checkMetric(key, value);
  }
  return metrics;
}

function toWalletStats(row: WalletStatsRow): WalletStats {
  return {
    address: row.address,
    ts: row.ts,
    hashrate1m: row.hashrate1m,
    hashrate5m: row.hashrate5m,
    hashrate1hr: row.hashrate1hr,
    hashrate1d: row.hashrate1d,
    hashrate7d: row.hashrate7d,
    lastshare: row.lastshare,
    workers: row.workers,
    shares: row.shares,
    bestshare: row.bestshare,
    bestever: row.bestever,
    authorised: row.authorised,
    activeWorkers: parseWorkerList(row.active_workers),
    activeWorkersCount: row.active_workers_count ?? 0,
  };
}

/**
 * WalletStatsStore reads user_stats rows and accepts pool-metric writes from
 * the ingestion side
 */
export class WalletStatsStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(db: Database.Database, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  getWalletStats(address: string): WalletStats | null {
    assertIdentifier("wallet", address);
    let row: WalletStatsRow | undefined;
    try {
      row = this.db
        .prepare<[string], WalletStatsRow>(
          `SELECT ${SELECT_COLUMNS} FROM user_stats WHERE address = ?`
        )
        .get(address);
    } catch (e) {
      throw toStorageError(`Reading stats of ${address}`, e);
    }
    return row ? toWalletStats(row) : null;
  }

  /**
   * Wallets with the most active workers first
   */
  listWallets(limit: number): WalletStats[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("limit must be a positive integer");
    }
    let rows: WalletStatsRow[];
    try {
      rows = this.db
        .prepare<[number], WalletStatsRow>(
          `SELECT ${SELECT_COLUMNS} FROM user_stats
           WHERE address IS NOT NULL
           ORDER BY active_workers_count DESC, address
           LIMIT ?`
        )
        .all(limit);
    } catch (e) {
      throw toStorageError("Listing wallets", e);
    }
    return rows.map(toWalletStats);
  }

  /**
   * Upsert pool metrics for a wallet. Provided keys overwrite their column
   * (null clears it); absent keys keep the stored value. A new row gets
   * its derived fields computed from workers_seen; an existing row keeps
   * them.
   */
  upsertPoolMetrics(address: string, metrics: PoolMetricsInput): WalletStats {
    assertIdentifier("wallet", address);
    const names = METRIC_NAMES.filter((name) => metrics[name] !== undefined);
    if (names.length === 0) {
      throw new ValidationError("At least one pool metric is required");
    }

    const params: Record<string, string | number | null> = { address };
    for (const name of names) {
      params[name] = checkMetric(name, metrics[name]);
    }

    const derived = activeWorkersSql("@address");
    const sql = `
      INSERT INTO user_stats (address, ${names.join(", ")}, active_workers, active_workers_count)
      VALUES (@address, ${names.map((n) => `@${n}`).join(", ")}, ${derived.list}, ${derived.count})
      ON CONFLICT(address) DO UPDATE SET
        ${names.map((n) => `${n} = excluded.${n}`).join(",\n        ")}`;

    const stats = withTransaction(this.db, `Updating stats of ${address}`, () => {
      this.db.prepare<Record<string, string | number | null>>(sql).run(params);
      return this.getWalletStats(address);
    });
    if (!stats) {
      throw new StorageError(`user_stats row for ${address} missing after write`);
    }

    this.logger.debug("Pool metrics updated", { address, columns: names });
    return stats;
  }
}
