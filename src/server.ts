import { serve } from "@hono/node-server";
import app from "./index";
import type { Env } from "./types";
import { loadConfig } from "./config";
import { createLogger } from "./middleware";
import { openDatabase, initSchema } from "./db";
import { StalenessSweep, SweepScheduler } from "./services";

/**
 * Process entry point: open the pool database, run the schema upgrade,
 * start the sweep timer and serve the API.
 */
async function main(): Promise<void> {
  const logger = createLogger({ component: "server" });
  const config = loadConfig(process.env, logger);

  const db = openDatabase(config.DATABASE_PATH, logger);
  initSchema(db, logger);

  const env: Env = { ...config, DB: db };

  const scheduler = new SweepScheduler(
    new StalenessSweep(db, createLogger({ component: "sweep" })),
    logger,
    {
      timeoutSeconds: config.WORKER_TIMEOUT,
      intervalSeconds: config.SWEEP_INTERVAL,
    }
  );
  scheduler.runOnce();
  scheduler.start();

  const server = serve(
    {
      fetch: (request) => app.fetch(request, env),
      port: config.PORT,
      hostname: config.HOST,
    },
    (info) => {
      logger.info("Listening", {
        address: info.address,
        port: info.port,
        database: config.DATABASE_PATH,
        workerTimeout: config.WORKER_TIMEOUT,
      });
    }
  );

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    scheduler.stop();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("Failed to start:", e);
  process.exit(1);
});
