/**
 * Buffer Module - Service Layer
 *
 * One poll of the hub status buffer: fetch, extract, parse.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  BUFFER_STATUS_PATH,
  type HubTransport,
  getHubTransport,
} from "../transport/index.js";
import { type BufferError, transportFailed } from "./errors.js";
import type { Ack } from "./schema.js";
import { extractBufferPayload, parseBuffer } from "./transform.js";

const log = createLogger("buffer");

/**
 * Poll the hub once and return the Acks found in its buffer.
 * An empty list means nothing new, not a failure.
 */
export async function pollBuffer(
  transport: HubTransport = getHubTransport(),
): Promise<Result<Ack[], BufferError>> {
  const body = await transport.fetch(BUFFER_STATUS_PATH);
  if (body.isErr()) {
    return err(transportFailed(body.error));
  }

  const payload = extractBufferPayload(body.value);
  if (payload.isErr()) {
    log.warn({ length: body.value.length }, "Buffer status without payload");
    return err(payload.error);
  }

  const acks = parseBuffer(payload.value);

  log.trace(
    { payloadLength: payload.value.length, acks: acks.length },
    "Hub buffer parsed",
  );

  return ok(acks);
}
