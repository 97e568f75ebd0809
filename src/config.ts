import type { Config, Logger } from "./types";

/** Default seconds before a silent worker is demoted */
export const DEFAULT_WORKER_TIMEOUT = 300;

export const DEFAULT_CONFIG: Config = {
  DATABASE_PATH: "pool.sqlite",
  WORKER_TIMEOUT: DEFAULT_WORKER_TIMEOUT,
  SWEEP_INTERVAL: 60,
  PORT: 8787,
  HOST: "0.0.0.0",
};

type EnvSource = Record<string, string | undefined>;

/**
 * Parse a positive integer setting, falling back to the default (with a
 * warning) when the value is missing or malformed
 */
function readPositiveInt(
  source: EnvSource,
  name: keyof Config,
  fallback: number,
  logger: Logger
): number {
  const raw = source[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    logger.warn(`Invalid ${name}; using ${fallback}`, { raw });
    return fallback;
  }
  return n;
}

function readString(source: EnvSource, name: keyof Config, fallback: string): string {
  const raw = source[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the service configuration from environment variables.
 *
 * WORKER_TIMEOUT is shared with the pool parser and the dashboard; the sweep
 * and every "is this worker online" check must use the same value.
 */
export function loadConfig(source: EnvSource, logger: Logger): Config {
  return {
    DATABASE_PATH: readString(source, "DATABASE_PATH", DEFAULT_CONFIG.DATABASE_PATH),
    WORKER_TIMEOUT: readPositiveInt(
      source,
      "WORKER_TIMEOUT",
      DEFAULT_CONFIG.WORKER_TIMEOUT,
      logger
    ),
    SWEEP_INTERVAL: readPositiveInt(
      source,
      "SWEEP_INTERVAL",
      DEFAULT_CONFIG.SWEEP_INTERVAL,
      logger
    ),
    PORT: readPositiveInt(source, "PORT", DEFAULT_CONFIG.PORT, logger),
    HOST: readString(source, "HOST", DEFAULT_CONFIG.HOST),
  };
}
