import type { Context } from "hono";
import type Database from "better-sqlite3";

/**
 * Logger interface for request-scoped and background logging
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Settings read from the process environment (see config.ts)
 */
export interface Config {
  /** SQLite file shared with the pool ingestion layer */
  DATABASE_PATH: string;
  /** Seconds without activity before a worker is demoted.
   *  Must match the "online" threshold the dashboard uses. */
  WORKER_TIMEOUT: number;
  /** Seconds between scheduled sweeps */
  SWEEP_INTERVAL: number;
  PORT: number;
  HOST: string;
}

/**
 * Bindings handed to every request through app.fetch(request, env)
 */
export interface Env extends Config {
  DB: Database.Database;
}

// =============================================================================
// Presence Types
// =============================================================================

/**
 * One row of workers_seen
 */
export interface WorkerPresence {
  wallet: string;
  worker: string;
  active: boolean;
  /** Unix seconds of the last observed activity (null on rows from old parsers) */
  lastSeen: number | null;
}

/**
 * Raw workers_seen row as SQLite returns it
 */
export interface WorkerPresenceRow {
  wallet: string;
  worker: string;
  active: number;
  last_seen: number | null;
}

/**
 * Derived active-worker fields of a user_stats row
 */
export interface ActiveWorkerSummary {
  address: string;
  activeWorkers: string[];
  activeWorkersCount: number;
}

/**
 * A worker demoted by a sweep
 */
export interface DemotedWorker {
  wallet: string;
  worker: string;
  lastSeen: number;
}

export interface SweepResult {
  /** Unix seconds the sweep measured staleness against */
  now: number;
  timeoutSeconds: number;
  demoted: DemotedWorker[];
  /** Wallets whose summary was recomputed, in first-demotion order */
  wallets: string[];
}

// =============================================================================
// Wallet Stats Types
// =============================================================================

/**
 * Pool-side metrics of a wallet. Written by the ingestion layer only;
 * the presence service never modifies them.
 */
export interface PoolMetrics {
  ts: number | null;
  hashrate1m: string | null;
  hashrate5m: string | null;
  hashrate1hr: string | null;
  hashrate1d: string | null;
  hashrate7d: string | null;
  lastshare: number | null;
  workers: number | null;
  shares: number | null;
  bestshare: number | null;
  bestever: number | null;
  authorised: number | null;
}

export type PoolMetricName = keyof PoolMetrics;

/**
 * A pool-metric write: present keys overwrite, absent keys are kept
 */
export type PoolMetricsInput = Partial<Record<PoolMetricName, string | number | null>>;

/**
 * A user_stats row: pool metrics plus the derived active-worker fields
 */
export interface WalletStats extends PoolMetrics, ActiveWorkerSummary {}

/**
 * Raw user_stats row as SQLite returns it
 */
export interface WalletStatsRow extends PoolMetrics {
  address: string;
  active_workers: string | null;
  active_workers_count: number | null;
}

// =============================================================================
// API Types
// =============================================================================

export type ApiErrorCode =
  | "INVALID_REQUEST"
  | "NOT_FOUND"
  | "STORAGE_ERROR"
  | "INTERNAL_ERROR";

/**
 * Structured error response with retry guidance
 */
export interface ApiErrorResponse {
  success: false;
  error: string;
  code: ApiErrorCode;
  details?: string;
  retryable: boolean;
  retryAfter?: number;
  requestId: string;
}

/**
 * Hono context variables set by middleware
 */
export interface AppVariables {
  requestId: string;
  logger: Logger;
}

/**
 * Typed Hono context for this application
 */
export type AppContext = Context<{ Bindings: Env; Variables: AppVariables }>;
