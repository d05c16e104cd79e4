/**
 * Events Module - Recent Message Cache
 *
 * Bounded fingerprint -> last-seen map. Entries past the TTL behave exactly
 * like absent ones, so sweeping them changes nothing observable. Past
 * `maxEntries` the least recently seen entries are dropped.
 */
import type { DedupEntry } from "./schema.js";
import { isNewsworthy } from "./transform.js";

export class RecentMessages {
  // Insertion order is kept equal to last-seen order
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
  ) {}

  get size(): number {
    return this.seen.size;
  }

  /**
   * Record `fingerprint` as seen at `now`.
   *
   * @returns true when the message should be published
   */
  observe(fingerprint: string, now: number): boolean {
    const publish = isNewsworthy(this.seen.get(fingerprint), now, this.ttlMs);

    this.seen.delete(fingerprint);
    this.seen.set(fingerprint, now);

    if (this.seen.size > this.maxEntries) {
      this.sweep(now);
      this.evictOldest();
    }

    return publish;
  }

  /**
   * Drop every entry older than the TTL.
   *
   * @returns number of entries removed
   */
  sweep(now: number): number {
    let removed = 0;
    for (const [fingerprint, lastSeen] of this.seen) {
      if (now - lastSeen > this.ttlMs) {
        this.seen.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  entries(): DedupEntry[] {
    return [...this.seen].map(([fingerprint, lastSeen]) => ({
      fingerprint,
      lastSeen,
    }));
  }

  private evictOldest(): void {
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) {
        return;
      }
      this.seen.delete(oldest.value);
    }
  }
}
