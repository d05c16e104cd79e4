/**
 * Transport Module - Public API
 *
 * Serialized HTTP access to the hub.
 */

// Types
export type { GateClock, HubTransport, HubTransportConfig } from "./schema.js";
export {
  BUFFER_STATUS_PATH,
  CLEAR_BUFFER_PATH,
  commandPath,
} from "./schema.js";

// Errors
export type { TransportError } from "./errors.js";
export {
  formatTransportError,
  httpError,
  networkError,
  timeout,
} from "./errors.js";

// Gate
export { HubGate } from "./gate.js";

// Service functions
export {
  basicAuthHeader,
  createHubTransport,
  getHubTransport,
} from "./service.js";
