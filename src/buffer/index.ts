/**
 * Buffer Module - Public API
 *
 * Decoding of the hub status buffer into Acks and Messages.
 */

// Types
export type {
  Ack,
  AckCommand,
  FrameRead,
  HubMessage,
  MessageStatus,
  MessageType,
  UnknownCode,
} from "./schema.js";
export {
  ACK_BYTE,
  ACK_HEADER_LENGTH,
  MESSAGE_FLAG,
  MESSAGE_FRAME_LENGTH,
} from "./schema.js";

// Errors
export type { BufferError } from "./errors.js";
export { formatBufferError, missingPayload } from "./errors.js";

// Transformations
export {
  decodeAckCommand,
  decodeMessageStatus,
  decodeMessageType,
  describeCommand,
  extractBufferPayload,
  flattenMessages,
  parseBuffer,
  readAckHeader,
  readMessageFrame,
  skipToNextPrefix,
} from "./transform.js";

// Service functions
export { pollBuffer } from "./service.js";
