/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Hub bridge configuration covering:
 * - Server settings
 * - Hub connection (host, credentials, request pacing)
 * - Event subscriber (dedup window, cache bound)
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("HubBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Hub Connection
  // ==========================================================================
  HUB_HOST: z.string().min(1, "HUB_HOST is required").describe("Hub address"),
  HUB_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(25105)
    .describe("Hub HTTP port"),
  HUB_USERNAME: z
    .string()
    .min(1, "HUB_USERNAME is required")
    .describe("Hub basic-auth user"),
  HUB_PASSWORD: z
    .string()
    .min(1, "HUB_PASSWORD is required")
    .describe("Hub basic-auth password"),
  HUB_REQUEST_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(1000)
    .describe("Minimum gap between two hub requests (ms)"),
  HUB_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("HTTP timeout for a single hub request (ms)"),

  // ==========================================================================
  // Event Subscriber
  // ==========================================================================
  ENABLE_SUBSCRIBER: envBoolean(true).describe(
    "Run the hub event loop at startup",
  ),
  CLEAR_BUFFER_ON_START: envBoolean(true).describe(
    "Clear the hub buffer before the first poll",
  ),
  STATUS_TTL_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Window in which an identical message is not re-published"),
  DEDUP_MAX_ENTRIES: z.coerce
    .number()
    .int()
    .positive()
    .default(1024)
    .describe("Upper bound on remembered message fingerprints"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Hub connection settings for the transport layer.
 */
export function getHubConfig(): Readonly<{
  baseUrl: string;
  username: string;
  password: string;
  requestDelayMs: number;
  timeoutMs: number;
}> {
  return {
    baseUrl: `http://${config.HUB_HOST}:${config.HUB_PORT}`,
    username: config.HUB_USERNAME,
    password: config.HUB_PASSWORD,
    requestDelayMs: config.HUB_REQUEST_DELAY_MS,
    timeoutMs: config.HUB_TIMEOUT_MS,
  };
}

/**
 * Event subscriber settings.
 * Returns null if the subscriber is disabled.
 */
export function getSubscriberConfig(): Readonly<{
  statusTtlMs: number;
  maxEntries: number;
  clearOnStart: boolean;
}> | null {
  if (!config.ENABLE_SUBSCRIBER) {
    return null;
  }

  return {
    statusTtlMs: config.STATUS_TTL_MS,
    maxEntries: config.DEDUP_MAX_ENTRIES,
    clearOnStart: config.CLEAR_BUFFER_ON_START,
  };
}
