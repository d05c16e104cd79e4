/**
 * Hub Bridge - Application Entry Point
 *
 * Sets up Hono server with:
 * - Health check endpoints
 * - Device command routes
 * - SSE for hub messages
 * - Request ID tracing
 * - Global error handling
 * - Hub subscriber loop
 */
import "dotenv/config";

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { routes } from "./api/routes.js";
import { clearHubBuffer, formatCommandError } from "./commands/index.js";
import { config, getSubscriberConfig } from "./config.js";
import { startSubscriber, stopSubscriber } from "./events/index.js";
import { createLogger } from "./logger.js";
import {
  broadcastHubMessage,
  broadcastSubscriber,
  disconnectAllClients,
} from "./sse/index.js";
import { formatTransportError } from "./transport/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  POWER-LINE HUB BRIDGE");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    hubHost: config.HUB_HOST,
    hubPort: config.HUB_PORT,
    requestDelayMs: config.HUB_REQUEST_DELAY_MS,
  },
  "Configuration loaded",
);

const subscriberConfig = getSubscriberConfig();
if (subscriberConfig) {
  log.info(
    {
      statusTtlMs: subscriberConfig.statusTtlMs,
      maxEntries: subscriberConfig.maxEntries,
    },
    "Hub subscriber: ENABLED",
  );
} else {
  log.info("Hub subscriber: DISABLED");
}

console.log("");

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", routes);

// =============================================================================
// START SUBSCRIBER
// =============================================================================

async function runSubscriber(): Promise<void> {
  if (!subscriberConfig) return;

  if (subscriberConfig.clearOnStart) {
    const cleared = await clearHubBuffer();
    if (cleared.isErr()) {
      log.warn(
        { error: formatCommandError(cleared.error) },
        "Could not clear hub buffer, subscribing anyway",
      );
    }
  }

  broadcastSubscriber(true, null);

  const result = await startSubscriber(broadcastHubMessage, {
    statusTtlMs: subscriberConfig.statusTtlMs,
    maxEntries: subscriberConfig.maxEntries,
  });

  broadcastSubscriber(
    false,
    result.isErr() ? formatTransportError(result.error) : null,
  );
}

runSubscriber().catch((error) => {
  log.error({ error }, "Subscriber crashed");
});

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop polling the hub
  stopSubscriber();

  // Close SSE connections
  disconnectAllClients();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
