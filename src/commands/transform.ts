/**
 * Commands Module - Pure Transformations
 *
 * Builds the hex strings the hub expects. No I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { type CommandError, invalidDeviceId, invalidLevel } from "./errors.js";
import {
  COMMAND_CODES,
  DEFAULT_FLAGS,
  DeviceIdSchema,
  type EncodedCommand,
  LevelSchema,
  MAX_LEVEL,
  PASS_THROUGH_PREFIX,
} from "./schema.js";

// =============================================================================
// Level Encoding
// =============================================================================

/**
 * Scale a 0-100 percentage to the 0-255 wire level.
 */
export function percentToLevel(percent: number): number {
  const clamped = Math.min(100, Math.max(0, percent));
  return Math.round((clamped / 100) * MAX_LEVEL);
}

/**
 * Encode a wire level as two upper-case hex digits.
 *
 * @example encodeLevel(255) // "FF"
 */
export function encodeLevel(level: number): string {
  return level.toString(16).toUpperCase().padStart(2, "0");
}

// =============================================================================
// Command Encoding
// =============================================================================

/**
 * Assemble `prefix + deviceId + flags + cmd1 + cmd2`, lower-cased.
 */
export function encodeCommand(
  deviceId: string,
  cmd1: string,
  cmd2 = "00",
  flags: string = DEFAULT_FLAGS,
): Result<EncodedCommand, CommandError> {
  if (!DeviceIdSchema.safeParse(deviceId).success) {
    return err(invalidDeviceId(deviceId));
  }

  const hex = `${PASS_THROUGH_PREFIX}${deviceId}${flags}${cmd1}${cmd2}`.toLowerCase();

  return ok({ deviceId, flags, cmd1, cmd2, hex });
}

/**
 * Turn a device on at `level` (0-255, default full).
 */
export function encodeOn(
  deviceId: string,
  level: number = MAX_LEVEL,
): Result<EncodedCommand, CommandError> {
  if (!LevelSchema.safeParse(level).success) {
    return err(invalidLevel(level));
  }
  return encodeCommand(deviceId, COMMAND_CODES.on, encodeLevel(level));
}

export function encodeOff(
  deviceId: string,
): Result<EncodedCommand, CommandError> {
  return encodeCommand(deviceId, COMMAND_CODES.off);
}

export function encodeStatus(
  deviceId: string,
): Result<EncodedCommand, CommandError> {
  return encodeCommand(deviceId, COMMAND_CODES.status);
}
