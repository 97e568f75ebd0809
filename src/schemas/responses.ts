/**
 * Shared OpenAPI response schemas
 * Used across endpoints so success and error shapes stay consistent
 */

/**
 * Base error response schema with common fields
 */
export const BaseErrorSchema = {
  type: "object" as const,
  properties: {
    success: { type: "boolean" as const, example: false },
    requestId: { type: "string" as const, format: "uuid" },
    error: { type: "string" as const },
    code: { type: "string" as const },
    details: { type: "string" as const },
    retryable: { type: "boolean" as const },
  },
};

/**
 * Error response with retry guidance (includes retryAfter field)
 */
export const RetryableErrorSchema = {
  type: "object" as const,
  properties: {
    ...BaseErrorSchema.properties,
    retryAfter: {
      type: "number" as const,
      description: "Seconds to wait before retrying",
    },
  },
};

/**
 * Retry-After header definition
 */
export const RetryAfterHeader = {
  "Retry-After": {
    description: "Seconds to wait before retrying",
    schema: { type: "string" as const },
  },
};

/**
 * A workers_seen row
 */
export const WorkerPresenceSchema = {
  type: "object" as const,
  properties: {
    wallet: { type: "string" as const },
    worker: { type: "string" as const },
    active: { type: "boolean" as const },
    lastSeen: {
      type: "number" as const,
      nullable: true,
      description: "Unix seconds of the last observed activity",
    },
  },
};

/**
 * A user_stats row with the derived active-worker fields decoded
 */
export const WalletStatsSchema = {
  type: "object" as const,
  properties: {
    address: { type: "string" as const },
    ts: { type: "number" as const, nullable: true },
    hashrate1m: { type: "string" as const, nullable: true },
    hashrate5m: { type: "string" as const, nullable: true },
    hashrate1hr: { type: "string" as const, nullable: true },
    hashrate1d: { type: "string" as const, nullable: true },
    hashrate7d: { type: "string" as const, nullable: true },
    lastshare: { type: "number" as const, nullable: true },
    workers: { type: "number" as const, nullable: true },
    shares: { type: "number" as const, nullable: true },
    bestshare: { type: "number" as const, nullable: true },
    bestever: { type: "number" as const, nullable: true },
    authorised: { type: "number" as const, nullable: true },
    activeWorkers: {
      type: "array" as const,
      items: { type: "string" as const },
      description: "Names of the active workers, in the order they were first seen",
    },
    activeWorkersCount: { type: "number" as const },
  },
};

/**
 * 400 Bad Request - Invalid request
 */
export const Error400Response = {
  description: "Invalid request",
  content: {
    "application/json": {
      schema: BaseErrorSchema,
    },
  },
};

/**
 * 404 Not Found - Resource not found
 */
export const Error404Response = {
  description: "Resource not found",
  content: {
    "application/json": {
      schema: BaseErrorSchema,
    },
  },
};

/**
 * 500 Internal Server Error
 */
export const Error500Response = {
  description: "Internal server error",
  content: {
    "application/json": {
      schema: BaseErrorSchema,
    },
  },
};

/**
 * 503 Service Unavailable - SQLite busy or unavailable
 */
export const Error503Response = {
  description: "Database temporarily unavailable; nothing was written",
  content: {
    "application/json": {
      schema: RetryableErrorSchema,
    },
  },
  headers: RetryAfterHeader,
};
