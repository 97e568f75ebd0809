import { BaseEndpoint } from "./BaseEndpoint";
import { PresenceTracker } from "../services";
import type { AppContext, WorkerPresence } from "../types";
import {
  Error400Response,
  Error500Response,
  Error503Response,
  WorkerPresenceSchema,
} from "../schemas";

const presenceResponses = {
  "200": {
    description: "Presence recorded; the wallet's active-worker summary was recomputed",
    content: {
      "application/json": {
        schema: {
          type: "object" as const,
          properties: {
            success: { type: "boolean" as const, example: true },
            requestId: { type: "string" as const, format: "uuid" },
            presence: WorkerPresenceSchema,
            activeWorkers: {
              type: "array" as const,
              items: { type: "string" as const },
            },
          },
        },
      },
    },
  },
  "400": Error400Response,
  "500": Error500Response,
  "503": Error503Response,
};

type PresenceWrite = (
  tracker: PresenceTracker,
  wallet: string,
  worker: string,
  timestamp: number
) => WorkerPresence;

/**
 * Shared body handling for the two presence writes.
 * Body: { wallet: string, worker: string, timestamp?: number (Unix seconds, default now) }
 */
abstract class PresenceEndpoint extends BaseEndpoint {
  protected abstract readonly write: PresenceWrite;
  protected abstract readonly failure: string;

  async handle(c: AppContext) {
    const logger = this.getLogger(c);

    try {
      const body = await this.readJsonObject(c);
      const timestamp = body.timestamp === undefined ? this.nowSeconds() : body.timestamp;

      const tracker = new PresenceTracker(c.env.DB, logger);
      const presence = this.write(
        tracker,
        // Shape checks happen in the tracker before any row is touched
        typeof body.wallet === "string" ? body.wallet : "",
        typeof body.worker === "string" ? body.worker : "",
        typeof timestamp === "number" ? timestamp : -1
      );

      return this.ok(c, {
        presence,
        activeWorkers: tracker.activeWorkers(presence.wallet),
      });
    } catch (e) {
      return this.fail(c, e, this.failure);
    }
  }
}

/**
 * Record worker activity
 * POST /workers/seen
 */
export class WorkerSeen extends PresenceEndpoint {
  schema = {
    tags: ["Workers"],
    summary: "Record that a worker was seen",
    description:
      "Creates the presence row for a wallet+worker pair or marks it active with a new last-seen time. " +
      "Body: { wallet, worker, timestamp? } where timestamp is Unix seconds and defaults to now.",
    responses: presenceResponses,
  };

  protected readonly write: PresenceWrite = (tracker, wallet, worker, timestamp) =>
    tracker.recordSeen(wallet, worker, timestamp);
  protected readonly failure = "Failed to record worker";
}

/**
 * Record a worker disconnect
 * POST /workers/dropped
 */
export class WorkerDropped extends PresenceEndpoint {
  schema = {
    tags: ["Workers"],
    summary: "Record that a worker disconnected",
    description:
      "Marks the worker inactive immediately instead of waiting for the staleness sweep. " +
      "Body: { wallet, worker, timestamp? } where timestamp is Unix seconds and defaults to now.",
    responses: presenceResponses,
  };

  protected readonly write: PresenceWrite = (tracker, wallet, worker, timestamp) =>
    tracker.recordDropped(wallet, worker, timestamp);
  protected readonly failure = "Failed to record worker disconnect";
}
