/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting of hub activity.
 */
import type { HubMessage } from "../buffer/index.js";
import type { CommandName } from "../commands/index.js";
import { createLogger } from "../logger.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

const encoder = new TextEncoder();

function encodeEvent(type: string, payload: unknown): Uint8Array {
  return encoder.encode(`event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`);
}

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client.
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = {
        id: clientId,
        controller,
        connected: true,
      };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      // Send initial connection confirmation
      controller.enqueue(encodeEvent("connected", { clientId }));
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

/**
 * Remove a client by ID.
 */
export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (client) {
    client.connected = false;
    clients = clients.filter((c) => c.id !== clientId);
    log.debug({ clientId }, "SSE client removed");
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encodeEvent(event.type, event);

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      // Client went away between filter and enqueue
      client.connected = false;
      errorCount++;
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "Dropping SSE client",
      );
    }
  }

  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
  }

  log.debug(
    { eventType: event.type, sent: successCount, failed: errorCount },
    "Event broadcasted",
  );
}

/**
 * Broadcast a deduplicated hub message.
 */
export function broadcastHubMessage(message: HubMessage): void {
  broadcast({ type: "hub_message", message, receivedAt: Date.now() });
}

/**
 * Broadcast a command accepted by the hub.
 */
export function broadcastCommandSent(
  deviceId: string,
  command: CommandName,
  level: number | null,
): void {
  broadcast({ type: "command_sent", deviceId, command, level });
}

/**
 * Broadcast subscriber status.
 */
export function broadcastSubscriber(
  running: boolean,
  lastError: string | null,
): void {
  broadcast({ type: "subscriber", running, lastError });
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encodeEvent(event.type, event));
    return true;
  } catch (error) {
    client.connected = false;
    log.debug(
      { clientId, error: error instanceof Error ? error.message : String(error) },
      "SSE client gone",
    );
    return false;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch (error) {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE stream already closed",
      );
    }
  }

  clients = [];
}
