/**
 * Events Module - Public API
 *
 * Deduplicated stream of hub messages.
 */

// Types
export type {
  DedupEntry,
  MessageHandler,
  SubscribeOptions,
  SubscriberState,
  SubscriptionSummary,
} from "./schema.js";
export { INITIAL_SUBSCRIBER_STATE } from "./schema.js";

// Cache
export { RecentMessages } from "./cache.js";

// Transformations
export {
  canonicalMessage,
  fingerprintMessage,
  isNewsworthy,
} from "./transform.js";

// Service functions
export {
  getSubscriberState,
  startSubscriber,
  stopSubscriber,
  subscribe,
} from "./service.js";
