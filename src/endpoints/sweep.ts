import { BaseEndpoint } from "./BaseEndpoint";
import { StalenessSweep } from "../services";
import type { AppContext } from "../types";
import { Error400Response, Error500Response, Error503Response } from "../schemas";

/**
 * Sweep endpoint - demote stale workers on demand
 * POST /sweep
 *
 * Lets an external timer (cron, systemd) drive the sweep instead of the
 * in-process scheduler. Body is optional: { timeoutSeconds?, now? }.
 */
export class Sweep extends BaseEndpoint {
  schema = {
    tags: ["Workers"],
    summary: "Demote stale workers",
    description:
      "Marks inactive every active worker whose last-seen time is more than timeoutSeconds before now. " +
      "timeoutSeconds defaults to the configured WORKER_TIMEOUT and now to the current Unix time. " +
      "Running it again with the same now changes nothing.",
    responses: {
      "200": {
        description: "Sweep completed",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: { type: "string" as const, format: "uuid" },
                now: { type: "number" as const },
                timeoutSeconds: { type: "number" as const, example: 300 },
                demoted: {
                  type: "array" as const,
                  items: {
                    type: "object" as const,
                    properties: {
                      wallet: { type: "string" as const },
                      worker: { type: "string" as const },
                      lastSeen: { type: "number" as const },
                    },
                  },
                },
                wallets: {
                  type: "array" as const,
                  items: { type: "string" as const },
                  description: "Wallets whose active-worker summary changed",
                },
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

    try {
      // Empty body: configured timeout, current time
      const body = await this.readJsonObject(c, { optional: true });

      const timeoutSeconds = body.timeoutSeconds ?? c.env.WORKER_TIMEOUT;
      const now = body.now ?? this.nowSeconds();

      const result = new StalenessSweep(c.env.DB, logger).sweep(
        typeof timeoutSeconds === "number" ? timeoutSeconds : NaN,
        typeof now === "number" ? now : NaN
      );
      return this.ok(c, result);
    } catch (e) {
      return this.fail(c, e, "Sweep failed");
    }
  }
}
