/**
 * Commands Module - Schemas and Types
 *
 * Wire constants and validation for outbound hub commands.
 */
import { z } from "zod";

// =============================================================================
// Wire Constants
// =============================================================================

/** Marks a frame passed straight through to the power-line modem */
export const PASS_THROUGH_PREFIX = "0262";

/** Flags byte sent with every command unless overridden */
export const DEFAULT_FLAGS = "0F";

/**
 * Command bytes (cmd1) understood by the encoder and parser.
 */
export const COMMAND_CODES = {
  on: "11",
  off: "13",
  status: "19",
} as const;

export type CommandName = keyof typeof COMMAND_CODES;

export const MAX_LEVEL = 255;

// =============================================================================
// Validation Schemas
// =============================================================================

/**
 * Device address: three bytes as six hex characters.
 */
export const DeviceIdSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{6}$/, "Device id must be 6 hex characters");

/**
 * Raw brightness level as sent on the wire.
 */
export const LevelSchema = z.number().int().min(0).max(MAX_LEVEL);

/**
 * Brightness as a percentage, the unit callers of the HTTP API use.
 */
export const PercentSchema = z.number().min(0).max(100);

/**
 * Body of an "on" request. Level defaults to full brightness.
 */
export const OnRequestSchema = z
  .object({
    level: PercentSchema.optional(),
  })
  .strict();

export type OnRequest = z.infer<typeof OnRequestSchema>;

// =============================================================================
// Encoded Command
// =============================================================================

/**
 * One command ready to be submitted.
 */
export type EncodedCommand = Readonly<{
  deviceId: string;
  flags: string;
  cmd1: string;
  cmd2: string;
  /** Full lower-cased hex string */
  hex: string;
}>;
