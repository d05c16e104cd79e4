/**
 * Last-resort handler for exceptions thrown out of a route.
 *
 * Route handlers turn every expected failure into a Result and answer with
 * 400 or 502 themselves, so anything landing here is a bug. The body keeps
 * the `{ success, message, requestId }` shape of the other error responses.
 */
import type { ErrorHandler } from "hono";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

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
    "Unhandled error in route",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ success: false, message, requestId }, 500);
};
