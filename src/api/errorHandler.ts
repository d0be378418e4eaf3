/**
 * Global error boundary - catches all unhandled errors.
 * Anything a route throws ends here as a logged 500.
 */
import type { ErrorHandler } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 * Logs errors with context and returns clean JSON response.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Internal messages stay out of production responses
  const message =
    config.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json(
    {
      error: message,
      requestId,
    },
    500,
  );
};
