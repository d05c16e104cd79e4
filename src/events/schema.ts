/**
 * Events Module - Schemas and Types
 *
 * Types for the poll-and-deduplicate subscriber loop.
 */
import type { HubMessage } from "../buffer/index.js";

/**
 * Receives every Message that was not seen within the TTL window.
 */
export type MessageHandler = (message: HubMessage) => void;

/**
 * Options of one subscription.
 */
export type SubscribeOptions = Readonly<{
  /** An identical message is re-published only after this many ms */
  statusTtlMs: number;
  /** Upper bound on remembered fingerprints */
  maxEntries: number;
  /** Stops the loop before its next poll */
  signal?: AbortSignal;
  now?: () => number;
}>;

/**
 * Totals of a subscription that ended without a transport error.
 */
export type SubscriptionSummary = Readonly<{
  cycles: number;
  published: number;
}>;

/**
 * Fingerprint to last-seen timestamp.
 */
export type DedupEntry = Readonly<{
  fingerprint: string;
  lastSeen: number;
}>;

/**
 * State of the application's running subscriber.
 */
export type SubscriberState = Readonly<{
  running: boolean;
  startedAt: number | null;
  publishedCount: number;
  lastMessageAt: number | null;
  lastError: string | null;
}>;

export const INITIAL_SUBSCRIBER_STATE: SubscriberState = {
  running: false,
  startedAt: null,
  publishedCount: 0,
  lastMessageAt: null,
  lastError: null,
};
