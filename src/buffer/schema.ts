/**
 * Buffer Module - Schemas and Types
 *
 * Frame layouts and decoded records of the hub status buffer.
 *
 * Ack header (18 hex chars):
 *   prefix(4) deviceId(6) flags(2) cmd1(2) cmd2(2) ack(2)
 * Message frame (22 hex chars):
 *   msgFlag(4) from(6) to(6) flags(2) cmd1(2) cmd2(2)
 */

// =============================================================================
// Wire Constants
// =============================================================================

export const ACK_BYTE = "06";
export const MESSAGE_FLAG = "0250";

export const ACK_HEADER_LENGTH = 18;
export const MESSAGE_FRAME_LENGTH = 22;

/** Characters dropped from the end of every polled payload */
export const PAYLOAD_TRAILER_LENGTH = 2;

export const BUFFER_OPEN_TAG = "<BS>";
export const BUFFER_CLOSE_TAG = "</BS>";

// =============================================================================
// Decoded Records
// =============================================================================

/**
 * Command bytes the parser does not recognize, kept as received.
 */
export type UnknownCode = Readonly<{
  kind: "unknown";
  cmd1: string;
  cmd2: string;
}>;

/**
 * What an Ack acknowledges.
 */
export type AckCommand =
  | Readonly<{ kind: "status_request" }>
  | Readonly<{ kind: "on" }>
  | Readonly<{ kind: "off" }>
  | UnknownCode;

/**
 * What a Message reports.
 */
export type MessageType =
  | Readonly<{ kind: "status" }>
  | Readonly<{ kind: "on" }>
  | Readonly<{ kind: "off" }>
  | Readonly<{ kind: "unknown"; cmd1: string }>;

/**
 * Level 0-255 for recognized commands, otherwise the raw command bytes.
 */
export type MessageStatus = number | UnknownCode;

/**
 * A state-change report nested under an Ack.
 */
export type HubMessage = Readonly<{
  from: string;
  to: string;
  flags: string;
  status: MessageStatus;
  type: MessageType;
}>;

/**
 * A hub-acknowledged command and the messages that followed it.
 */
export type Ack = Readonly<{
  deviceId: string;
  flags: string;
  command: AckCommand;
  responses: readonly HubMessage[];
}>;

/**
 * Outcome of reading one fixed-width frame from the front of a buffer.
 * `invalid` means the markers did not match; `exhausted` means too few
 * characters remain for a whole frame.
 */
export type FrameRead<T> =
  | Readonly<{ kind: "frame"; value: T; rest: string }>
  | Readonly<{ kind: "invalid" }>
  | Readonly<{ kind: "exhausted" }>;
