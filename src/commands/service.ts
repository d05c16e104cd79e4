/**
 * Commands Module - Service Layer
 *
 * Submits encoded commands to the hub. A 2xx response is the only success
 * signal; the device's answer, if any, shows up later in the hub buffer.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  CLEAR_BUFFER_PATH,
  type HubTransport,
  commandPath,
  getHubTransport,
} from "../transport/index.js";
import { type CommandError, transportFailed } from "./errors.js";
import type { EncodedCommand } from "./schema.js";
import { encodeOff, encodeOn, encodeStatus, percentToLevel } from "./transform.js";

const log = createLogger("commands");

/**
 * Submit an already encoded command.
 */
export async function submitCommand(
  command: EncodedCommand,
  transport: HubTransport = getHubTransport(),
): Promise<Result<EncodedCommand, CommandError>> {
  const context = {
    deviceId: command.deviceId,
    cmd1: command.cmd1,
    cmd2: command.cmd2,
  };
  const startTime = Date.now();
  logOperationStart(log, "submitCommand", context);

  const result = await transport.send(commandPath(command.hex));
  if (result.isErr()) {
    logOperationFailed(log, "submitCommand", result.error.message, context);
    return err(transportFailed(result.error));
  }

  logOperationComplete(log, "submitCommand", startTime, context);
  return ok(command);
}

/**
 * Turn a device on.
 *
 * @param level - Wire level 0-255, default full brightness
 */
export async function turnDeviceOn(
  deviceId: string,
  level?: number,
  transport: HubTransport = getHubTransport(),
): Promise<Result<EncodedCommand, CommandError>> {
  const encoded = encodeOn(deviceId, level);
  if (encoded.isErr()) {
    return err(encoded.error);
  }
  return submitCommand(encoded.value, transport);
}

/**
 * Turn a device on at a 0-100 brightness percentage.
 */
export async function turnDeviceOnPercent(
  deviceId: string,
  percent: number,
  transport: HubTransport = getHubTransport(),
): Promise<Result<EncodedCommand, CommandError>> {
  return turnDeviceOn(deviceId, percentToLevel(percent), transport);
}

export async function turnDeviceOff(
  deviceId: string,
  transport: HubTransport = getHubTransport(),
): Promise<Result<EncodedCommand, CommandError>> {
  const encoded = encodeOff(deviceId);
  if (encoded.isErr()) {
    return err(encoded.error);
  }
  return submitCommand(encoded.value, transport);
}

/**
 * Ask a device to report its state. The answer arrives as a buffer message.
 */
export async function requestDeviceStatus(
  deviceId: string,
  transport: HubTransport = getHubTransport(),
): Promise<Result<EncodedCommand, CommandError>> {
  const encoded = encodeStatus(deviceId);
  if (encoded.isErr()) {
    return err(encoded.error);
  }
  return submitCommand(encoded.value, transport);
}

/**
 * Clear the hub's internal buffer.
 */
export async function clearHubBuffer(
  transport: HubTransport = getHubTransport(),
): Promise<Result<true, CommandError>> {
  log.info("Clearing hub buffer");

  const result = await transport.send(CLEAR_BUFFER_PATH);
  if (result.isErr()) {
    log.error({ error: result.error.message }, "Failed to clear hub buffer");
    return err(transportFailed(result.error));
  }

  return ok(true);
}
