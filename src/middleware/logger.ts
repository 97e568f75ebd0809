import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";
import type { Env, Logger, AppVariables } from "../types";

/**
 * Create a console logger. Every line carries the base context merged with
 * the per-call context.
 */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    info: (message, context) => {
      console.log(`[INFO] ${message}`, { ...baseContext, ...context });
    },
    warn: (message, context) => {
      console.warn(`[WARN] ${message}`, { ...baseContext, ...context });
    },
    error: (message, context) => {
      console.error(`[ERROR] ${message}`, { ...baseContext, ...context });
    },
    debug: (message, context) => {
      console.debug(`[DEBUG] ${message}`, { ...baseContext, ...context });
    },
  };
}

/**
 * Logger middleware - creates request-scoped logger and stores in context
 */
export async function loggerMiddleware(
  c: Context<{ Bindings: Env; Variables: AppVariables }>,
  next: Next
) {
  const requestId = randomUUID();
  const logger = createLogger({
    request_id: requestId,
    path: c.req.path,
    method: c.req.method,
  });

  c.set("requestId", requestId);
  c.set("logger", logger);

  return next();
}
