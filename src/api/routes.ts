/**
 * API routes for the hub bridge.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/devices/:deviceId/* - Device commands (on, off, status)
 * - /api/hub/* - Hub buffer (clear, one-off poll)
 * - /api/subscriber - Event loop state
 * - /api/events - SSE stream of hub messages
 */
import { type Context, Hono } from "hono";
import { type Result, err, ok } from "neverthrow";
import { pollBuffer, formatBufferError } from "../buffer/index.js";
import {
  type CommandError,
  type CommandName,
  type EncodedCommand,
  type OnRequest,
  OnRequestSchema,
  clearHubBuffer,
  formatCommandError,
  percentToLevel,
  requestDeviceStatus,
  turnDeviceOff,
  turnDeviceOn,
} from "../commands/index.js";
import { config, getSubscriberConfig } from "../config.js";
import { getSubscriberState } from "../events/index.js";
import { createLogger } from "../logger.js";
import {
  broadcastCommandSent,
  createSseStream,
  getClientCount,
  removeClient,
  sendToClient,
} from "../sse/index.js";

const log = createLogger("api");

export const routes = new Hono();

// =============================================================================
// Helpers
// =============================================================================

function commandErrorStatus(error: CommandError): 400 | 502 {
  return error.type === "TRANSPORT_FAILED" ? 502 : 400;
}

/**
 * Parse the optional JSON body of an "on" request.
 */
async function readOnRequest(c: Context): Promise<Result<OnRequest, string>> {
  const text = await c.req.text();
  if (text.trim() === "") {
    return ok({});
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(
      `Body must be JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = OnRequestSchema.safeParse(json);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return ok(parsed.data);
}

function respondToCommand(
  c: Context,
  command: CommandName,
  result: Result<EncodedCommand, CommandError>,
) {
  const requestId = c.get("requestId");

  if (result.isErr()) {
    log.error(
      { requestId, command, error: formatCommandError(result.error) },
      "Device command failed",
    );
    return c.json(
      {
        success: false,
        message: formatCommandError(result.error),
        requestId,
      },
      commandErrorStatus(result.error),
    );
  }

  const sent = result.value;
  const level = command === "on" ? Number.parseInt(sent.cmd2, 16) : null;
  broadcastCommandSent(sent.deviceId, command, level);

  return c.json({
    success: true,
    deviceId: sent.deviceId,
    command,
    hex: sent.hex,
    requestId,
  });
}

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - returns system status.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  const subscriberConfig = getSubscriberConfig();

  return c.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    requestId,
    config: {
      hubHost: config.HUB_HOST,
      hubPort: config.HUB_PORT,
      requestDelayMs: config.HUB_REQUEST_DELAY_MS,
      subscriberEnabled: subscriberConfig !== null,
      statusTtlMs: subscriberConfig?.statusTtlMs ?? null,
    },
    subscriber: getSubscriberState(),
    sseClients: getClientCount(),
  });
});

// =============================================================================
// Device Commands
// =============================================================================

/**
 * Turn a device on. Optional body: { "level": 0-100 } (percent).
 */
routes.post("/api/devices/:deviceId/on", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("deviceId");
  log.info({ requestId, deviceId }, "POST /api/devices/:deviceId/on");

  const body = await readOnRequest(c);
  if (body.isErr()) {
    return c.json({ success: false, message: body.error, requestId }, 400);
  }

  const level =
    body.value.level === undefined ? undefined : percentToLevel(body.value.level);

  return respondToCommand(c, "on", await turnDeviceOn(deviceId, level));
});

routes.post("/api/devices/:deviceId/off", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("deviceId");
  log.info({ requestId, deviceId }, "POST /api/devices/:deviceId/off");

  return respondToCommand(c, "off", await turnDeviceOff(deviceId));
});

/**
 * Ask a device for its state. The answer arrives on /api/events.
 */
routes.post("/api/devices/:deviceId/status", async (c) => {
  const requestId = c.get("requestId");
  const deviceId = c.req.param("deviceId");
  log.info({ requestId, deviceId }, "POST /api/devices/:deviceId/status");

  return respondToCommand(c, "status", await requestDeviceStatus(deviceId));
});

// =============================================================================
// Hub Buffer
// =============================================================================

routes.post("/api/hub/clear", async (c) => {
  const requestId = c.get("requestId");
  log.info({ requestId }, "POST /api/hub/clear");

  const result = await clearHubBuffer();
  if (result.isErr()) {
    return c.json(
      { success: false, message: formatCommandError(result.error), requestId },
      502,
    );
  }

  return c.json({ success: true, requestId });
});

/**
 * Poll the hub once and return the decoded buffer without deduplication.
 */
routes.get("/api/hub/buffer", async (c) => {
  const requestId = c.get("requestId");
  log.info({ requestId }, "GET /api/hub/buffer");

  const result = await pollBuffer();
  if (result.isErr()) {
    return c.json(
      { success: false, message: formatBufferError(result.error), requestId },
      502,
    );
  }

  return c.json({ success: true, acks: result.value, requestId });
});

// =============================================================================
// Subscriber & Events
// =============================================================================

routes.get("/api/subscriber", (c) => {
  return c.json(getSubscriberState());
});

/**
 * SSE stream of deduplicated hub messages.
 */
routes.get("/api/events", (c) => {
  const requestId = c.get("requestId");

  const { stream, clientId } = createSseStream();
  log.info({ requestId, clientId }, "SSE client connected");

  const subscriber = getSubscriberState();
  sendToClient(clientId, {
    type: "subscriber",
    running: subscriber.running,
    lastError: subscriber.lastError,
  });

  c.req.raw.signal.addEventListener("abort", () => removeClient(clientId));

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});
