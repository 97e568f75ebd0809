import type { Logger, SweepResult } from "./types";
import { loadConfig } from "./config";
import { openDatabase, initSchema } from "./db";
import { StalenessSweep } from "./services";
import { ValidationError } from "./errors";

export interface SweepCommandOptions {
  db: string;
  timeoutSeconds: number;
  now: number;
}

/**
 * Parse `--db <path> --timeout <seconds> --now <unix>`. Missing flags fall
 * back to DATABASE_PATH, WORKER_TIMEOUT and the current time.
 */
export function parseSweepArgs(
  argv: string[],
  env: Record<string, string | undefined>,
  logger: Logger,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): SweepCommandOptions {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      throw new ValidationError(`Unexpected argument: ${arg}`);
    }
    const key = arg.slice(2);
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ValidationError(`Missing value for --${key}`);
    }
    parsed[key] = value;
    i++;
  }

  for (const key of Object.keys(parsed)) {
    if (key !== "db" && key !== "timeout" && key !== "now") {
      throw new ValidationError(`Unknown option: --${key}`);
    }
  }

  const config = loadConfig(env, logger);
  return {
    db: parsed.db ?? config.DATABASE_PATH,
    timeoutSeconds: parsed.timeout !== undefined ? Number(parsed.timeout) : config.WORKER_TIMEOUT,
    now: parsed.now !== undefined ? Number(parsed.now) : nowSeconds,
  };
}

/**
 * One-shot sweep for cron-style scheduling. Safe to run repeatedly.
 */
export function runSweepCommand(options: SweepCommandOptions, logger: Logger): SweepResult {
  const db = openDatabase(options.db, logger);
  try {
    initSchema(db, logger);
    return new StalenessSweep(db, logger).sweep(options.timeoutSeconds, options.now);
  } finally {
    db.close();
  }
}
