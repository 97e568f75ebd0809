/**
 * Demote stale workers once and exit
 *
 * Usage:
 *   npm run sweep                                   # DATABASE_PATH, WORKER_TIMEOUT, now
 *   npm run sweep -- --db /srv/pool/pool.sqlite --timeout 300
 *   npm run sweep -- --now 1700000000               # sweep as of a given Unix time
 *
 * Crontab (every minute):
 *   * * * * * cd /srv/pool-worker-presence && npm run --silent sweep
 *
 * Keep --timeout equal to WORKER_TIMEOUT of the server and the pool parser,
 * otherwise the dashboard and the active-worker summary disagree.
 */

import { createLogger } from "../src/middleware";
import { parseSweepArgs, runSweepCommand } from "../src/sweep-command";

async function main() {
  const logger = createLogger({ component: "sweep-cli" });
  const options = parseSweepArgs(process.argv.slice(2), process.env, logger);

  console.log(`Sweeping ${options.db} (timeout ${options.timeoutSeconds}s, now ${options.now})`);
  const result = runSweepCommand(options, logger);

  if (result.demoted.length === 0) {
    console.log("No stale workers");
    return;
  }
  for (const w of result.demoted) {
    console.log(`  demoted ${w.wallet}.${w.worker} (last seen ${w.lastSeen})`);
  }
  console.log(`${result.demoted.length} worker(s) across ${result.wallets.length} wallet(s)`);
}

main().catch((e) => {
  console.error("Sweep failed:", e instanceof Error ? e.message : e);
  process.exit(1);
});
