/**
 * Buffer Module - Error Types
 *
 * Malformed frames never become errors: the parser resynchronizes past them.
 * Only a poll that cannot produce a payload at all fails.
 */
import {
  type TransportError,
  formatTransportError,
} from "../transport/index.js";

/**
 * All possible errors from the buffer module.
 */
export type BufferError =
  | { type: "MISSING_PAYLOAD"; message: string; body: string }
  | { type: "TRANSPORT_FAILED"; message: string; cause: TransportError };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function missingPayload(body: string): BufferError {
  return {
    type: "MISSING_PAYLOAD",
    message: "Response has no <BS> payload",
    body,
  };
}

export function transportFailed(cause: TransportError): BufferError {
  return {
    type: "TRANSPORT_FAILED",
    message: formatTransportError(cause),
    cause,
  };
}

/**
 * Format error for logging/display.
 */
export function formatBufferError(error: BufferError): string {
  switch (error.type) {
    case "MISSING_PAYLOAD":
      return `Unreadable buffer status: ${error.message}`;
    case "TRANSPORT_FAILED":
      return `Buffer poll failed: ${error.message}`;
  }
}
