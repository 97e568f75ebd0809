import { BaseEndpoint } from "./BaseEndpoint";
import type { AppContext } from "../types";
import { VERSION } from "../version";

/**
 * Health check endpoint
 * GET /health
 */
export class Health extends BaseEndpoint {
  schema = {
    tags: ["Health"],
    summary: "Health check with presence settings",
    responses: {
      "200": {
        description: "Service health status",
        content: {
          "application/json": {
            schema: {
              type: "object" as const,
              properties: {
                success: { type: "boolean" as const, example: true },
                requestId: {
                  type: "string" as const,
                  format: "uuid",
                  description: "Unique request identifier for tracking",
                },
                status: { type: "string" as const, example: "ok" },
                version: { type: "string" as const, example: VERSION },
                workerTimeout: {
                  type: "number" as const,
                  example: 300,
                  description: "Seconds without activity before a worker is demoted",
                },
              },
            },
          },
        },
      },
    },
  };

  async handle(c: AppContext) {
    return this.ok(c, {
      status: "ok",
      version: VERSION,
      workerTimeout: c.env.WORKER_TIMEOUT,
    });
  }
}
