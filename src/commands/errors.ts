/**
 * Commands Module - Error Types
 *
 * Typed error union for building and submitting hub commands.
 */
import {
  type TransportError,
  formatTransportError,
} from "../transport/index.js";

/**
 * All possible errors from the commands module.
 */
export type CommandError =
  | { type: "INVALID_DEVICE_ID"; message: string; deviceId: string }
  | { type: "INVALID_LEVEL"; message: string; level: number }
  | { type: "TRANSPORT_FAILED"; message: string; cause: TransportError };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function invalidDeviceId(deviceId: string): CommandError {
  return {
    type: "INVALID_DEVICE_ID",
    message: "Device id must be 6 hex characters",
    deviceId,
  };
}

export function invalidLevel(level: number): CommandError {
  return {
    type: "INVALID_LEVEL",
    message: "Level must be an integer between 0 and 255",
    level,
  };
}

export function transportFailed(cause: TransportError): CommandError {
  return {
    type: "TRANSPORT_FAILED",
    message: formatTransportError(cause),
    cause,
  };
}

/**
 * Format error for logging/display.
 */
export function formatCommandError(error: CommandError): string {
  switch (error.type) {
    case "INVALID_DEVICE_ID":
      return `Invalid device id '${error.deviceId}': ${error.message}`;
    case "INVALID_LEVEL":
      return `Invalid level ${error.level}: ${error.message}`;
    case "TRANSPORT_FAILED":
      return `Command not delivered: ${error.message}`;
  }
}
