/**
 * Transport Module - Schemas and Types
 *
 * Hub endpoints and the transport contract shared by the command and
 * polling paths.
 */
import type { Result } from "neverthrow";

import type { TransportError } from "./errors.js";

// =============================================================================
// Hub Endpoints
// =============================================================================

export const BUFFER_STATUS_PATH = "/buffstatus.xml";
export const CLEAR_BUFFER_PATH = "/1?XB=M=1";

/**
 * Path that submits an encoded command to the hub.
 */
export function commandPath(hexCommand: string): string {
  return `/3?${hexCommand}=I=3`;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Hub connection configuration.
 */
export type HubTransportConfig = Readonly<{
  baseUrl: string;
  username: string;
  password: string;
  /** Minimum gap between the end of one request and the start of the next */
  requestDelayMs: number;
  timeoutMs: number;
}>;

/**
 * Clock and sleep used by the request gate. Swapped out in tests.
 */
export type GateClock = Readonly<{
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}>;

// =============================================================================
// Transport Contract
// =============================================================================

/**
 * Serialized access to the hub. Every call waits its turn at the same gate.
 */
export type HubTransport = Readonly<{
  /** GET `path` and return the response body */
  fetch: (path: string) => Promise<Result<string, TransportError>>;
  /** GET `path`; a 2xx status is the only success signal */
  send: (path: string) => Promise<Result<true, TransportError>>;
}>;
