/**
 * API Routes Integration Tests
 *
 * Tests API endpoints with mocked service layer.
 * Uses Hono's app.request() for realistic HTTP testing.
 */
import { describe, expect, test, vi, beforeEach } from "vitest";
import { Hono } from "hono";

// Keep encoders and error helpers real, stub the calls that reach the hub
vi.mock("../../commands/index.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../commands/index.js")>();
  return {
    ...actual,
    turnDeviceOn: vi.fn(),
    turnDeviceOff: vi.fn(),
    requestDeviceStatus: vi.fn(),
    clearHubBuffer: vi.fn(),
  };
});

vi.mock("../../buffer/index.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../buffer/index.js")>();
  return {
    ...actual,
    pollBuffer: vi.fn(),
  };
});

vi.mock("../../events/index.js", () => ({
  getSubscriberState: vi.fn(() => ({
    running: true,
    startedAt: 1700000000000,
    publishedCount: 3,
    lastMessageAt: 1700000005000,
    lastError: null,
  })),
}));

vi.mock("../../sse/index.js", () => ({
  getClientCount: vi.fn(() => 0),
  createSseStream: vi.fn(() => ({
    stream: new ReadableStream(),
    clientId: 1,
  })),
  removeClient: vi.fn(),
  sendToClient: vi.fn(() => true),
  broadcastCommandSent: vi.fn(),
}));

vi.mock("../../config.js", () => ({
  config: {
    HUB_HOST: "10.0.0.5",
    HUB_PORT: 25105,
    HUB_REQUEST_DELAY_MS: 1000,
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
  getHubConfig: () => ({
    baseUrl: "http://10.0.0.5:25105",
    username: "hub",
    password: "test-secret",
    requestDelayMs: 1000,
    timeoutMs: 5000,
  }),
  getSubscriberConfig: () => ({
    statusTtlMs: 60000,
    maxEntries: 1024,
    clearOnStart: true,
  }),
}));

// Mock logger to prevent pino initialization issues
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Now import the modules (after mocks are set up)
import { ok, err } from "neverthrow";
import { routes } from "../routes.js";
import { missingPayload, pollBuffer } from "../../buffer/index.js";
import {
  type EncodedCommand,
  clearHubBuffer,
  invalidDeviceId,
  requestDeviceStatus,
  transportFailed,
  turnDeviceOff,
  turnDeviceOn,
} from "../../commands/index.js";
import {
  broadcastCommandSent,
  getClientCount,
  sendToClient,
} from "../../sse/index.js";
import { timeout } from "../../transport/index.js";

const ON_FULL: EncodedCommand = {
  deviceId: "1a2b3c",
  flags: "0F",
  cmd1: "11",
  cmd2: "FF",
  hex: "02621a2b3c0f11ff",
};

const OFF: EncodedCommand = {
  deviceId: "1a2b3c",
  flags: "0F",
  cmd1: "13",
  cmd2: "00",
  hex: "02621a2b3c0f1300",
};

const STATUS: EncodedCommand = {
  deviceId: "1a2b3c",
  flags: "0F",
  cmd1: "19",
  cmd2: "00",
  hex: "02621a2b3c0f1900",
};

// Create a test app with the routes
function createTestApp() {
  const app = new Hono();

  // Add minimal middleware for requestId
  app.use("*", async (c, next) => {
    c.set("requestId", "test-request-id");
    await next();
  });

  app.route("/", routes);
  return app;
}

function postJson(body: string): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  };
}

describe("API Routes", () => {
  let app: Hono;

  beforeEach(() => {
    app = createTestApp();
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  describe("GET /api/health", () => {
    test("returns 200 with hub and subscriber status", async () => {
      vi.mocked(getClientCount).mockReturnValue(5);

      const res = await app.request("/api/health");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.status).toBe("ok");
      expect(body.requestId).toBe("test-request-id");
      expect(body.config).toEqual({
        hubHost: "10.0.0.5",
        hubPort: 25105,
        requestDelayMs: 1000,
        subscriberEnabled: true,
        statusTtlMs: 60000,
      });
      expect(body.subscriber.publishedCount).toBe(3);
      expect(body.sseClients).toBe(5);
    });
  });

  // ===========================================================================
  // Device Commands - ON
  // ===========================================================================

  describe("POST /api/devices/:deviceId/on", () => {
    test("turns the device on at full level without a body", async () => {
      vi.mocked(turnDeviceOn).mockResolvedValue(ok(ON_FULL));

      const res = await app.request("/api/devices/1a2b3c/on", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        deviceId: "1a2b3c",
        command: "on",
        hex: "02621a2b3c0f11ff",
        requestId: "test-request-id",
      });
      expect(turnDeviceOn).toHaveBeenCalledWith("1a2b3c", undefined);
      expect(broadcastCommandSent).toHaveBeenCalledWith("1a2b3c", "on", 255);
    });

    test("scales a percentage level to the wire range", async () => {
      vi.mocked(turnDeviceOn).mockResolvedValue(
        ok({ ...ON_FULL, cmd2: "80", hex: "02621a2b3c0f1180" }),
      );

      const res = await app.request(
        "/api/devices/1a2b3c/on",
        postJson(JSON.stringify({ level: 50 })),
      );

      expect(res.status).toBe(200);
      expect(turnDeviceOn).toHaveBeenCalledWith("1a2b3c", 128);
      expect(broadcastCommandSent).toHaveBeenCalledWith("1a2b3c", "on", 128);
    });

    test("rejects a level above 100 percent", async () => {
      const res = await app.request(
        "/api/devices/1a2b3c/on",
        postJson(JSON.stringify({ level: 150 })),
      );
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.success).toBe(false);
      expect(turnDeviceOn).not.toHaveBeenCalled();
    });

    test("rejects a body that is not JSON", async () => {
      const res = await app.request("/api/devices/1a2b3c/on", postJson("{level"));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.message).toMatch(/^Body must be JSON: /);
      expect(turnDeviceOn).not.toHaveBeenCalled();
    });

    test("returns 400 for a malformed device id", async () => {
      vi.mocked(turnDeviceOn).mockResolvedValue(err(invalidDeviceId("zz")));

      const res = await app.request("/api/devices/zz/on", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.message).toBe(
        "Invalid device id 'zz': Device id must be 6 hex characters",
      );
      expect(broadcastCommandSent).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Device Commands - OFF / STATUS
  // ===========================================================================

  describe("POST /api/devices/:deviceId/off", () => {
    test("turns the device off", async () => {
      vi.mocked(turnDeviceOff).mockResolvedValue(ok(OFF));

      const res = await app.request("/api/devices/1a2b3c/off", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.command).toBe("off");
      expect(body.hex).toBe("02621a2b3c0f1300");
      expect(broadcastCommandSent).toHaveBeenCalledWith("1a2b3c", "off", null);
    });

    test("returns 502 when the hub cannot be reached", async () => {
      vi.mocked(turnDeviceOff).mockResolvedValue(
        err(transportFailed(timeout("/3?02621a2b3c0f1300=I=3", 5000))),
      );

      const res = await app.request("/api/devices/1a2b3c/off", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(502);
      expect(body).toEqual({
        success: false,
        message:
          "Command not delivered: Timeout after 5000ms on /3?02621a2b3c0f1300=I=3",
        requestId: "test-request-id",
      });
      expect(broadcastCommandSent).not.toHaveBeenCalled();
    });
  });

  describe("POST /api/devices/:deviceId/status", () => {
    test("submits a status request", async () => {
      vi.mocked(requestDeviceStatus).mockResolvedValue(ok(STATUS));

      const res = await app.request("/api/devices/1a2b3c/status", {
        method: "POST",
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.command).toBe("status");
      expect(requestDeviceStatus).toHaveBeenCalledWith("1a2b3c");
      expect(broadcastCommandSent).toHaveBeenCalledWith("1a2b3c", "status", null);
    });
  });

  // ===========================================================================
  // Hub Buffer
  // ===========================================================================

  describe("POST /api/hub/clear", () => {
    test("clears the buffer", async () => {
      vi.mocked(clearHubBuffer).mockResolvedValue(ok(true));

      const res = await app.request("/api/hub/clear", { method: "POST" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        requestId: "test-request-id",
      });
    });

    test("returns 502 when the hub refuses", async () => {
      vi.mocked(clearHubBuffer).mockResolvedValue(
        err(transportFailed(timeout("/1?XB=M=1", 5000))),
      );

      const res = await app.request("/api/hub/clear", { method: "POST" });
      const body = await res.json();

      expect(res.status).toBe(502);
      expect(body.message).toBe(
        "Command not delivered: Timeout after 5000ms on /1?XB=M=1",
      );
    });
  });

  describe("GET /api/hub/buffer", () => {
    test("returns the decoded acks", async () => {
      const acks = [
        {
          deviceId: "1A2B3C",
          flags: "0F",
          command: { kind: "status_request" as const },
          responses: [
            {
              from: "1A2B3C",
              to: "AABBCC",
              flags: "2B",
              status: 128,
              type: { kind: "status" as const },
            },
          ],
        },
      ];
      vi.mocked(pollBuffer).mockResolvedValue(ok(acks));

      const res = await app.request("/api/hub/buffer");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        acks,
        requestId: "test-request-id",
      });
    });

    test("returns 502 for an unreadable response", async () => {
      vi.mocked(pollBuffer).mockResolvedValue(err(missingPayload("<html/>")));

      const res = await app.request("/api/hub/buffer");
      const body = await res.json();

      expect(res.status).toBe(502);
      expect(body.message).toBe(
        "Unreadable buffer status: Response has no <BS> payload",
      );
    });
  });

  // ===========================================================================
  // Subscriber & Events
  // ===========================================================================

  describe("GET /api/subscriber", () => {
    test("returns the subscriber state", async () => {
      const res = await app.request("/api/subscriber");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        running: true,
        startedAt: 1700000000000,
        publishedCount: 3,
        lastMessageAt: 1700000005000,
        lastError: null,
      });
    });
  });

  describe("GET /api/events", () => {
    test("opens a stream and greets the client with the subscriber state", async () => {
      const res = await app.request("/api/events");

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("text/event-stream");
      expect(sendToClient).toHaveBeenCalledWith(1, {
        type: "subscriber",
        running: true,
        lastError: null,
      });
    });
  });
});
