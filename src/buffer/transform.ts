/**
 * Buffer Module - Pure Transformations
 *
 * Framing state machine for the hub status buffer. The buffer interleaves
 * Ack headers with zero or more Message frames and carries no frame counts,
 * so parsing relies on fixed-width reads plus a scan for the next
 * pass-through prefix whenever an Ack header does not line up.
 */
import { type Result, err, ok } from "neverthrow";

import { COMMAND_CODES, PASS_THROUGH_PREFIX } from "../commands/index.js";
import { type BufferError, missingPayload } from "./errors.js";
import {
  ACK_BYTE,
  ACK_HEADER_LENGTH,
  type Ack,
  type AckCommand,
  BUFFER_CLOSE_TAG,
  BUFFER_OPEN_TAG,
  type FrameRead,
  type HubMessage,
  MESSAGE_FLAG,
  MESSAGE_FRAME_LENGTH,
  type MessageStatus,
  type MessageType,
  PAYLOAD_TRAILER_LENGTH,
} from "./schema.js";

// =============================================================================
// Command Decoding
// =============================================================================

export function decodeAckCommand(cmd1: string, cmd2: string): AckCommand {
  switch (cmd1) {
    case COMMAND_CODES.status:
      return { kind: "status_request" };
    case COMMAND_CODES.on:
      return { kind: "on" };
    case COMMAND_CODES.off:
      return { kind: "off" };
    default:
      return { kind: "unknown", cmd1, cmd2 };
  }
}

export function decodeMessageType(cmd1: string): MessageType {
  switch (cmd1) {
    case COMMAND_CODES.status:
      return { kind: "status" };
    case COMMAND_CODES.on:
      return { kind: "on" };
    case COMMAND_CODES.off:
      return { kind: "off" };
    default:
      return { kind: "unknown", cmd1 };
  }
}

/**
 * Level carried in cmd2 for recognized commands, raw bytes otherwise.
 */
export function decodeMessageStatus(cmd1: string, cmd2: string): MessageStatus {
  const recognized =
    cmd1 === COMMAND_CODES.on ||
    cmd1 === COMMAND_CODES.off ||
    cmd1 === COMMAND_CODES.status;

  if (recognized && /^[0-9a-fA-F]{2}$/.test(cmd2)) {
    return Number.parseInt(cmd2, 16);
  }
  return { kind: "unknown", cmd1, cmd2 };
}

/**
 * Human-readable label for a decoded command, used in logs.
 */
export function describeCommand(command: AckCommand | MessageType): string {
  switch (command.kind) {
    case "unknown":
      return "cmd2" in command
        ? `unknown[${command.cmd1}::${command.cmd2}]`
        : `unknown[${command.cmd1}]`;
    default:
      return command.kind;
  }
}

// =============================================================================
// Frame Readers
// =============================================================================

/**
 * Read an Ack header from the front of `buffer`.
 * A short buffer is reported as `invalid`: the ack byte cannot match.
 */
export function readAckHeader(buffer: string): FrameRead<Ack> {
  const prefix = buffer.slice(0, 4);
  const deviceId = buffer.slice(4, 10);
  const flags = buffer.slice(10, 12);
  const cmd1 = buffer.slice(12, 14);
  const cmd2 = buffer.slice(14, 16);
  const ackByte = buffer.slice(16, ACK_HEADER_LENGTH);

  if (prefix !== PASS_THROUGH_PREFIX || ackByte !== ACK_BYTE) {
    return { kind: "invalid" };
  }

  return {
    kind: "frame",
    value: {
      deviceId,
      flags,
      command: decodeAckCommand(cmd1, cmd2),
      responses: [],
    },
    rest: buffer.slice(ACK_HEADER_LENGTH),
  };
}

/**
 * Read one Message frame from the front of `buffer`.
 */
export function readMessageFrame(buffer: string): FrameRead<HubMessage> {
  if (buffer.length < MESSAGE_FRAME_LENGTH) {
    return { kind: "exhausted" };
  }

  const msgFlag = buffer.slice(0, 4);
  if (msgFlag !== MESSAGE_FLAG) {
    return { kind: "invalid" };
  }

  const cmd1 = buffer.slice(18, 20);
  const cmd2 = buffer.slice(20, 22);

  return {
    kind: "frame",
    value: {
      from: buffer.slice(4, 10),
      to: buffer.slice(10, 16),
      flags: buffer.slice(16, 18),
      status: decodeMessageStatus(cmd1, cmd2),
      type: decodeMessageType(cmd1),
    },
    rest: buffer.slice(MESSAGE_FRAME_LENGTH),
  };
}

/**
 * Skip to the first pass-through prefix in `buffer` (inclusive).
 * Returns the empty string when there is none.
 */
export function skipToNextPrefix(buffer: string): string {
  const index = buffer.indexOf(PASS_THROUGH_PREFIX);
  return index === -1 ? "" : buffer.slice(index);
}

// =============================================================================
// Buffer Parsing
// =============================================================================

/**
 * Decode a raw hex buffer into Acks with their nested Messages.
 *
 * Never fails. Bad Ack headers trigger a scan to the next prefix; a scan that
 * does not move stops the parse. A bad Message header closes the current Ack
 * and its bytes are retried as an Ack header. Running out of characters
 * mid-Message closes the current Ack and ends the parse.
 */
export function parseBuffer(raw: string): Ack[] {
  const acks: Ack[] = [];
  let rest = raw;

  while (rest.length > 0) {
    const header = readAckHeader(rest);

    if (header.kind !== "frame") {
      const skipped = skipToNextPrefix(rest);
      if (skipped === rest) {
        break;
      }
      rest = skipped;
      continue;
    }

    rest = header.rest;
    const responses: HubMessage[] = [];

    for (;;) {
      const frame = readMessageFrame(rest);

      if (frame.kind === "exhausted") {
        acks.push({ ...header.value, responses });
        return acks;
      }

      if (frame.kind === "invalid") {
        acks.push({ ...header.value, responses });
        break;
      }

      responses.push(frame.value);
      rest = frame.rest;
    }
  }

  return acks;
}

/**
 * All Messages of all Acks, in arrival order.
 */
export function flattenMessages(acks: readonly Ack[]): HubMessage[] {
  return acks.flatMap((ack) => ack.responses);
}

// =============================================================================
// Poll Response
// =============================================================================

/**
 * Pull the hex payload out of a `/buffstatus.xml` body and drop its
 * two-character trailer.
 */
export function extractBufferPayload(body: string): Result<string, BufferError> {
  const start = body.indexOf(BUFFER_OPEN_TAG);
  if (start === -1) {
    return err(missingPayload(body));
  }

  const afterOpen = body.slice(start + BUFFER_OPEN_TAG.length);
  const end = afterOpen.indexOf(BUFFER_CLOSE_TAG);
  const payload = end === -1 ? afterOpen : afterOpen.slice(0, end);

  return ok(payload.slice(0, Math.max(0, payload.length - PAYLOAD_TRAILER_LENGTH)));
}
