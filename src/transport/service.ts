/**
 * Transport Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the hub, serialized through one
 * HubGate. Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { getHubConfig } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type TransportError,
  httpError,
  networkError,
  timeout,
} from "./errors.js";
import { HubGate } from "./gate.js";
import type { GateClock, HubTransport, HubTransportConfig } from "./schema.js";

const log = createLogger("transport");

/**
 * Build the basic-auth header value for the hub credentials.
 */
export function basicAuthHeader(username: string, password: string): string {
  const token = Buffer.from(`${username}:${password}`).toString("base64");
  return `Basic ${token}`;
}

/**
 * Map a rejected fetch or body read to a transport error.
 */
function toTransportError(
  path: string,
  error: unknown,
  timeoutMs: number,
  message: string,
): TransportError {
  const cause = error instanceof Error ? error : new Error(String(error));

  if (cause.name === "TimeoutError" || cause.name === "AbortError") {
    return timeout(path, timeoutMs);
  }

  return networkError(path, message, cause);
}

/**
 * Release the connection without reading what the hub sent.
 */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

/**
 * Create a transport bound to one hub. All calls made through the returned
 * object share a single gate.
 *
 * A request holds the gate until its body has been read or discarded, so the
 * hub never sees two open requests and the delay counts from the last byte.
 *
 * @param config - Hub connection configuration
 * @param clock - Optional clock for the gate (tests)
 */
export function createHubTransport(
  config: HubTransportConfig,
  clock?: GateClock,
): HubTransport {
  const gate = new HubGate(config.requestDelayMs, clock);
  const authorization = basicAuthHeader(config.username, config.password);

  async function request<T>(
    path: string,
    readBody: (response: Response) => Promise<T>,
  ): Promise<Result<T, TransportError>> {
    const url = `${config.baseUrl}${path}`;
    log.debug({ path, queued: gate.size }, "Hub request queued");

    return gate.run(async (): Promise<Result<T, TransportError>> => {
      let response: Response;
      try {
        response = await fetch(url, {
          method: "GET",
          headers: { Authorization: authorization },
          signal: AbortSignal.timeout(config.timeoutMs),
        });
      } catch (error) {
        return err(
          toTransportError(path, error, config.timeoutMs, "Failed to reach hub"),
        );
      }

      if (!response.ok) {
        log.warn(
          { path, status: response.status },
          "Hub responded with an error status",
        );
        await discardBody(response).catch((error: unknown) => {
          log.debug({ path, error }, "Could not discard error response body");
        });
        return err(httpError(path, response.status, response.statusText));
      }

      return readBody(response).then(
        (body): Result<T, TransportError> => {
          log.debug({ path, status: response.status }, "Hub request completed");
          return ok(body);
        },
        (error: unknown): Result<T, TransportError> =>
          err(
            toTransportError(
              path,
              error,
              config.timeoutMs,
              "Failed to read hub response",
            ),
          ),
      );
    });
  }

  return {
    fetch(path) {
      return request(path, (response) => response.text());
    },

    async send(path) {
      const result = await request(path, discardBody);
      return result.map(() => true as const);
    },
  };
}

// =============================================================================
// Shared Instance
// =============================================================================

let sharedTransport: HubTransport | null = null;

/**
 * The process-wide transport for the configured hub. Commands and the event
 * subscriber both go through this instance, so hub access stays serialized.
 */
export function getHubTransport(): HubTransport {
  if (!sharedTransport) {
    sharedTransport = createHubTransport(getHubConfig());
  }
  return sharedTransport;
}
