/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { HubMessage } from "../buffer/index.js";
import type { CommandName } from "../commands/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A deduplicated message from the hub buffer.
 */
export type HubMessageEvent = Readonly<{
  type: "hub_message";
  message: HubMessage;
  receivedAt: number;
}>;

/**
 * A command accepted by the hub.
 */
export type CommandSentEvent = Readonly<{
  type: "command_sent";
  deviceId: string;
  command: CommandName;
  level: number | null;
}>;

/**
 * Subscriber loop status (sent on connect and when it changes).
 */
export type SubscriberEvent = Readonly<{
  type: "subscriber";
  running: boolean;
  lastError: string | null;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = HubMessageEvent | CommandSentEvent | SubscriberEvent;
