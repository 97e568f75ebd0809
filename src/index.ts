import { Hono } from "hono";
import { cors } from "hono/cors";
import { fromHono } from "chanfana";
import type { Env, AppVariables } from "./types";
import { loggerMiddleware } from "./middleware";
import {
  Health,
  WorkerSeen,
  WorkerDropped,
  WalletList,
  WalletStatsGet,
  WalletStatsPut,
  WalletWorkers,
  Sweep,
} from "./endpoints";
import { VERSION } from "./version";

// Create Hono app with type safety
const app = new Hono<{ Bindings: Env; Variables: AppVariables }>();

// Apply global middleware
app.use("/*", cors());
app.use("/*", loggerMiddleware);

// Initialize Chanfana for OpenAPI documentation
const openapi = fromHono(app, {
  docs_url: "/docs",
  openapi_url: "/openapi.json",
  schema: {
    info: {
      title: "Pool Worker Presence",
      version: VERSION,
      description:
        "Tracks which workers of each pool wallet are online and keeps the per-wallet active-worker summary in user_stats consistent with it.",
    },
    tags: [
      { name: "Health", description: "Service health endpoints" },
      { name: "Workers", description: "Worker presence writes and the staleness sweep" },
      { name: "Wallets", description: "Per-wallet stats and worker lists" },
    ],
  },
});

// Register endpoints with Chanfana (casts needed for extended endpoint classes)
openapi.get("/health", Health as unknown as typeof Health);
openapi.post("/workers/seen", WorkerSeen as unknown as typeof WorkerSeen);
openapi.post("/workers/dropped", WorkerDropped as unknown as typeof WorkerDropped);
openapi.post("/sweep", Sweep as unknown as typeof Sweep);
openapi.get("/wallets", WalletList as unknown as typeof WalletList);
openapi.get("/wallets/:address/stats", WalletStatsGet as unknown as typeof WalletStatsGet);
openapi.put("/wallets/:address/stats", WalletStatsPut as unknown as typeof WalletStatsPut);
openapi.get("/wallets/:address/workers", WalletWorkers as unknown as typeof WalletWorkers);

// Root endpoint - service info
app.get("/", (c) => {
  return c.json({
    service: "pool-worker-presence",
    version: VERSION,
    docs: "/docs",
    openapi: "/openapi.json",
    endpoints: {
      health: "GET /health - Health check with worker timeout",
      workerSeen: "POST /workers/seen - Record worker activity",
      workerDropped: "POST /workers/dropped - Record worker disconnect",
      sweep: "POST /sweep - Demote workers past the timeout",
      wallets: "GET /wallets - Wallets by active worker count",
      walletStats: "GET|PUT /wallets/:address/stats - Wallet stats row",
      walletWorkers: "GET /wallets/:address/workers - Presence rows of a wallet",
    },
  });
});

export { app };
export default app;
