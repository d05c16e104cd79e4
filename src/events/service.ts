/**
 * Events Module - Service Layer
 *
 * The subscriber loop: poll the hub, parse the buffer, drop messages seen
 * within the TTL window, hand the rest to the caller.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type HubMessage,
  describeCommand,
  flattenMessages,
  formatBufferError,
  pollBuffer,
} from "../buffer/index.js";
import {
  createLogger,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type HubTransport,
  type TransportError,
  formatTransportError,
  getHubTransport,
} from "../transport/index.js";
import { RecentMessages } from "./cache.js";
import {
  INITIAL_SUBSCRIBER_STATE,
  type MessageHandler,
  type SubscribeOptions,
  type SubscriberState,
  type SubscriptionSummary,
} from "./schema.js";
import { fingerprintMessage } from "./transform.js";

const log = createLogger("events");

// =============================================================================
// Subscriber Loop
// =============================================================================

/**
 * Poll the hub until `options.signal` aborts, delivering each novel message
 * to `handler`. Pacing comes from the transport gate.
 *
 * A transport error ends the loop and is returned as is. A buffer without a
 * payload is logged and skipped.
 */
export async function subscribe(
  handler: MessageHandler,
  options: SubscribeOptions,
  transport: HubTransport = getHubTransport(),
): Promise<Result<SubscriptionSummary, TransportError>> {
  const now = options.now ?? Date.now;
  const recent = new RecentMessages(options.statusTtlMs, options.maxEntries);
  let cycles = 0;
  let published = 0;

  while (!options.signal?.aborted) {
    const polled = await pollBuffer(transport);
    cycles++;

    if (polled.isErr()) {
      if (polled.error.type === "TRANSPORT_FAILED") {
        return err(polled.error.cause);
      }
      log.warn({ error: formatBufferError(polled.error) }, "Skipping poll cycle");
      continue;
    }

    const swept = recent.sweep(now());
    if (swept > 0) {
      log.trace({ swept, remaining: recent.size }, "Expired fingerprints swept");
    }

    for (const message of flattenMessages(polled.value)) {
      if (!recent.observe(fingerprintMessage(message), now())) {
        continue;
      }

      published++;
      log.debug(
        { from: message.from, to: message.to, type: describeCommand(message.type) },
        "Publishing hub message",
      );
      handler(message);
    }
  }

  return ok({ cycles, published });
}

// =============================================================================
// Application Subscriber
// =============================================================================

let state: SubscriberState = INITIAL_SUBSCRIBER_STATE;
let controller: AbortController | null = null;

/**
 * Get current subscriber state.
 */
export function getSubscriberState(): SubscriberState {
  return state;
}

/**
 * Run the application's subscriber until `stopSubscriber` is called or a
 * transport error ends it. Only one runs at a time.
 */
export async function startSubscriber(
  handler: MessageHandler,
  options: Omit<SubscribeOptions, "signal">,
  transport: HubTransport = getHubTransport(),
): Promise<Result<SubscriptionSummary, TransportError>> {
  if (controller) {
    log.warn("Subscriber already running");
    return ok({ cycles: 0, published: 0 });
  }

  const current = new AbortController();
  controller = current;
  state = {
    ...INITIAL_SUBSCRIBER_STATE,
    running: true,
    startedAt: Date.now(),
  };

  logOperationStart(log, "subscribe", {
    statusTtlMs: options.statusTtlMs,
    maxEntries: options.maxEntries,
  });

  const track = (message: HubMessage): void => {
    state = {
      ...state,
      publishedCount: state.publishedCount + 1,
      lastMessageAt: Date.now(),
    };
    handler(message);
  };

  try {
    const result = await subscribe(
      track,
      { ...options, signal: current.signal },
      transport,
    );

    if (result.isErr()) {
      const message = formatTransportError(result.error);
      state = { ...state, lastError: message };
      logOperationFailed(log, "subscribe", message);
    } else {
      log.info(result.value, "Subscriber stopped");
    }

    return result;
  } finally {
    state = { ...state, running: false };
    if (controller === current) {
      controller = null;
    }
  }
}

/**
 * Ask the running subscriber to stop before its next poll.
 */
export function stopSubscriber(): void {
  if (controller) {
    log.info("Stopping subscriber");
    controller.abort();
  }
}
