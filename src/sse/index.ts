/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  CommandSentEvent,
  HubMessageEvent,
  SseEvent,
  SubscriberEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastCommandSent,
  broadcastHubMessage,
  broadcastSubscriber,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";
