/**
 * Transport Module - Request Gate
 *
 * The hub holds one HTTP connection at a time. Every request runs through a
 * single gate: tasks run strictly one after another, and each waits until
 * `delayMs` has passed since the previous task released the gate.
 */
import type { GateClock } from "./schema.js";

const systemClock: GateClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class HubGate {
  private tail: Promise<void> = Promise.resolve();
  private releasedAt: number | null = null;
  private pending = 0;

  constructor(
    private readonly delayMs: number,
    private readonly clock: GateClock = systemClock,
  ) {}

  /**
   * Number of tasks queued or running.
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Run `task` once every earlier task has released the gate.
   * The task's own rejection reaches the caller; it never blocks later tasks.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;

    const result = this.tail.then(async () => {
      await this.waitForSpacing();
      try {
        return await task();
      } finally {
        this.releasedAt = this.clock.now();
        this.pending--;
      }
    });

    this.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }

  private async waitForSpacing(): Promise<void> {
    if (this.releasedAt === null) {
      return;
    }

    const waitMs = this.releasedAt + this.delayMs - this.clock.now();
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }
}
