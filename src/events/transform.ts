/**
 * Events Module - Pure Transformations
 *
 * Message fingerprints and the TTL rule for re-publishing.
 */
import { createHash } from "node:crypto";

import type { HubMessage } from "../buffer/index.js";

/**
 * Stable string form of a message: fixed field order, tagged values
 * flattened to arrays.
 */
export function canonicalMessage(message: HubMessage): string {
  const status =
    typeof message.status === "number"
      ? message.status
      : [message.status.kind, message.status.cmd1, message.status.cmd2];
  const type =
    message.type.kind === "unknown"
      ? [message.type.kind, message.type.cmd1]
      : message.type.kind;

  return JSON.stringify([
    message.from,
    message.to,
    message.flags,
    status,
    type,
  ]);
}

/**
 * SHA-1 of the canonical form, as hex.
 */
export function fingerprintMessage(message: HubMessage): string {
  return createHash("sha1").update(canonicalMessage(message)).digest("hex");
}

/**
 * A message is news when it was never seen, or last seen more than
 * `ttlMs` ago.
 */
export function isNewsworthy(
  lastSeen: number | undefined,
  now: number,
  ttlMs: number,
): boolean {
  return lastSeen === undefined || now - lastSeen > ttlMs;
}
