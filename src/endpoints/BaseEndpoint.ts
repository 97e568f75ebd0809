import { OpenAPIRoute } from "chanfana";
import type { AppContext, ApiErrorCode, ApiErrorResponse, Logger } from "../types";
import { StorageError, ValidationError } from "../errors";

/**
 * Base endpoint class with common helpers
 */
export class BaseEndpoint extends OpenAPIRoute {
  /**
   * Get the logger from context
   */
  protected getLogger(c: AppContext): Logger {
    return c.get("logger");
  }

  /**
   * Get the request ID from context
   */
  protected getRequestId(c: AppContext): string {
    return c.get("requestId");
  }

  /**
   * Current time in Unix seconds
   */
  protected nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
  }

  /**
   * Parse the JSON body into a plain object. With optional set, an empty
   * body reads as {}.
   */
  protected async readJsonObject(
    c: AppContext,
    opts: { optional?: boolean } = {}
  ): Promise<Record<string, unknown>> {
    const text = await c.req.text();
    if (opts.optional && text.trim() === "") {
      return {};
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (_e) {
      throw new ValidationError("Request body must be valid JSON");
    }
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new ValidationError("Request body must be a JSON object");
    }
    return { ...body };
  }

  /**
   * Return a success response with requestId
   */
  protected ok<T extends object>(
    c: AppContext,
    data: T,
    headers?: Record<string, string>
  ) {
    const response = {
      success: true as const,
      requestId: this.getRequestId(c),
      ...data,
    };
    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        c.header(key, value);
      }
    }
    return c.json(response);
  }

  /**
   * Return a structured error response with retry guidance
   */
  protected err(
    c: AppContext,
    opts: {
      error: string;
      code: ApiErrorCode;
      status: 400 | 404 | 500 | 503;
      details?: string;
      retryable: boolean;
      retryAfter?: number;
    }
  ) {
    const response: ApiErrorResponse = {
      success: false,
      error: opts.error,
      code: opts.code,
      retryable: opts.retryable,
      requestId: this.getRequestId(c),
    };

    if (opts.details) {
      response.details = opts.details;
    }

    if (opts.retryAfter !== undefined) {
      response.retryAfter = opts.retryAfter;
      c.header("Retry-After", opts.retryAfter.toString());
    }

    return c.json(response, opts.status);
  }

  /**
   * Map a thrown error to the error envelope:
   * ValidationError → 400, StorageError → 503 (retryable), anything else → 500
   */
  protected fail(c: AppContext, e: unknown, error: string) {
    const details = e instanceof Error ? e.message : "Unknown error";

    if (e instanceof ValidationError) {
      return this.err(c, {
        error,
        code: e.code,
        status: 400,
        details,
        retryable: false,
      });
    }

    const logger = this.getLogger(c);
    if (e instanceof StorageError) {
      logger.error(error, { error: details });
      return this.err(c, {
        error,
        code: e.code,
        status: 503,
        details,
        retryable: true,
        retryAfter: 1,
      });
    }

    logger.error(error, { error: details });
    return this.err(c, {
      error,
      code: "INTERNAL_ERROR",
      status: 500,
      details,
      retryable: false,
    });
  }
}
