/**
 * Commands Module - Public API
 *
 * Encoding and submission of on/off/status commands.
 */

// Types
export type { CommandName, EncodedCommand, OnRequest } from "./schema.js";
export {
  COMMAND_CODES,
  DEFAULT_FLAGS,
  DeviceIdSchema,
  LevelSchema,
  MAX_LEVEL,
  OnRequestSchema,
  PASS_THROUGH_PREFIX,
  PercentSchema,
} from "./schema.js";

// Errors
export type { CommandError } from "./errors.js";
export {
  formatCommandError,
  invalidDeviceId,
  invalidLevel,
  transportFailed,
} from "./errors.js";

// Transformations
export {
  encodeCommand,
  encodeLevel,
  encodeOff,
  encodeOn,
  encodeStatus,
  percentToLevel,
} from "./transform.js";

// Service functions
export {
  clearHubBuffer,
  requestDeviceStatus,
  submitCommand,
  turnDeviceOff,
  turnDeviceOn,
  turnDeviceOnPercent,
} from "./service.js";
