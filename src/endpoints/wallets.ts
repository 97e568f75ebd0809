import { BaseEndpoint } from "./BaseEndpoint";
import { PresenceTracker, WalletStatsStore, parsePoolMetrics } from "../services";
import type { AppContext } from "../types";
import {
  Error400Response,
  Error404Response,
  Error500Response,
  Error503Response,
  WalletStatsSchema,
  WorkerPresenceSchema,
} from "../schemas";

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

/**
 * Wallet list endpoint: wallets with the most active workers first
 * GET /wallets?limit=100
 */
export class WalletList extends BaseEndpoint {
  schema = {
    tags: ["Wallets"],
    summary: "List wallets by active workers",
    description: `Returns user_stats rows ordered by active worker count. Query params: limit (1-${MAX_LIMIT}, default ${DEFAULT_LIMIT}).`,
    responses: {
      "200": {
        description: "Wallets retrieved successfully",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: { type: "string" as const, format: "uuid" },
                count: { type: "number" as const },
                wallets: { type: "array" as const, items: WalletStatsSchema },
              },
            },
          },
        },
      },
      "500": Error500Response,
      "503": Error503Response,
    },
  };

  async handle(c: AppContext) {
    const logger = this.getLogger(c);

    try {
      const rawLimit = parseInt(c.req.query("limit") || String(DEFAULT_LIMIT), 10);
      const limit = Number.isNaN(rawLimit)
        ? DEFAULT_LIMIT
        : Math.min(Math.max(rawLimit, 1), MAX_LIMIT);

      const wallets = new WalletStatsStore(c.env.DB, logger).listWallets(limit);
      return this.ok(
        c,
        { count: wallets.length, wallets },
        { "Cache-Control": "public, max-age=10" }
      );
    } catch (e) {
      return this.fail(c, e, "Failed to list wallets");
    }
  }
}

/**
 * Wallet stats endpoint
 * GET /wallets/:address/stats
 */
export class WalletStatsGet extends BaseEndpoint {
  schema = {
    tags: ["Wallets"],
    summary: "Get the stats row of a wallet",
    description:
      "Returns pool metrics and the active-worker summary of one wallet. The address is passed as a URL path parameter.",
    responses: {
      "200": {
        description: "Wallet found",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: { type: "string" as const, format: "uuid" },
                stats: WalletStatsSchema,
              },
            },
          },
        },
      },
      "404": Error404Response,
      "500": Error500Response,
      "503": Error503Response,
    },
  };

  async handle(c: AppContext) {
    const logger = this.getLogger(c);
    const address = c.req.param("address") ?? "";

    try {
      const stats = new WalletStatsStore(c.env.DB, logger).getWalletStats(address);
      if (!stats) {
        return this.err(c, {
          error: "Wallet not found",
          code: "NOT_FOUND",
          status: 404,
          details: `No stats row for ${address}`,
          retryable: false,
        });
      }
      return this.ok(c, { stats });
    } catch (e) {
      return this.fail(c, e, "Failed to retrieve wallet stats");
    }
  }
}

/**
 * Pool metrics ingestion endpoint
 * PUT /wallets/:address/stats
 */
export class WalletStatsPut extends BaseEndpoint {
  schema = {
    tags: ["Wallets"],
    summary: "Upsert pool metrics of a wallet",
    description:
      "Writes pool-metric columns (ts, hashrate1m, hashrate5m, hashrate1hr, hashrate1d, hashrate7d, lastshare, " +
      "workers, shares, bestshare, bestever, authorised). Keys present in the body overwrite the stored value; " +
      "absent keys are kept. activeWorkers and activeWorkersCount are derived from worker presence and cannot be written.",
    responses: {
      "200": {
        description: "Metrics stored",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: { type: "string" as const, format: "uuid" },
                stats: WalletStatsSchema,
              },
            },
          },
        },
      },
      "400": Error400Response,
      "500": Error500Response,
      "503": Error503Response,
    },
  };

  async handle(c: AppContext) {
    const logger = this.getLogger(c);
    const address = c.req.param("address") ?? "";

    try {
      const metrics = parsePoolMetrics(await this.readJsonObject(c));
      const stats = new WalletStatsStore(c.env.DB, logger).upsertPoolMetrics(address, metrics);
      return this.ok(c, { stats });
    } catch (e) {
      return this.fail(c, e, "Failed to store pool metrics");
    }
  }
}

/**
 * Wallet workers endpoint
 * GET /wallets/:address/workers
 */
export class WalletWorkers extends BaseEndpoint {
  schema = {
    tags: ["Wallets"],
    summary: "Get the workers of a wallet",
    description:
      "Returns the active worker names and every presence row (active or not) of one wallet, in the order the workers were first seen.",
    responses: {
      "200": {
        description: "Workers retrieved",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: { type: "string" as const, format: "uuid" },
                wallet: { type: "string" as const },
                activeWorkers: {
                  type: "array" as const,
                  items: { type: "string" as const },
                },
                workers: { type: "array" as const, items: WorkerPresenceSchema },
              },
            },
          },
        },
      },
      "400": Error400Response,
      "500": Error500Response,
      "503": Error503Response,
    },
  };

  async handle(c: AppContext) {
    const logger = this.getLogger(c);
    const wallet = c.req.param("address") ?? "";

    try {
      const tracker = new PresenceTracker(c.env.DB, logger);
      return this.ok(
        c,
        {
          wallet,
          activeWorkers: tracker.activeWorkers(wallet),
          workers: tracker.listWorkers(wallet),
        },
        { "Cache-Control": "public, max-age=10" }
      );
    } catch (e) {
      return this.fail(c, e, "Failed to retrieve workers");
    }
  }
}
