/**
 * Transport Module - Error Types
 *
 * Typed error union for hub HTTP requests. Transport errors are fatal to the
 * operation that hit them; nothing in this module retries.
 */

/**
 * All possible errors from the transport module.
 */
export type TransportError =
  | { type: "HTTP_ERROR"; message: string; path: string; status: number }
  | { type: "NETWORK_ERROR"; message: string; path: string; cause?: Error }
  | { type: "TIMEOUT"; message: string; path: string; timeoutMs: number };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function httpError(
  path: string,
  status: number,
  statusText: string,
): TransportError {
  return {
    type: "HTTP_ERROR",
    message: `HTTP ${status}: ${statusText}`,
    path,
    status,
  };
}

export function networkError(
  path: string,
  message: string,
  cause?: Error,
): TransportError {
  return cause !== undefined
    ? { type: "NETWORK_ERROR", message, path, cause }
    : { type: "NETWORK_ERROR", message, path };
}

export function timeout(path: string, timeoutMs: number): TransportError {
  return {
    type: "TIMEOUT",
    message: "Request timed out",
    path,
    timeoutMs,
  };
}

/**
 * Format error for logging/display.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "HTTP_ERROR":
      return `Hub rejected ${error.path}: ${error.message}`;
    case "NETWORK_ERROR":
      return `Hub unreachable for ${error.path}: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms on ${error.path}`;
  }
}
