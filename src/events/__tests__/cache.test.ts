/**
 * Recent Message Cache Tests
 *
 * TTL behavior and bounds of the dedup cache.
 */
import { describe, expect, it } from "vitest";

import { RecentMessages } from "../cache.js";

describe("RecentMessages", () => {
  describe("observe", () => {
    it("publishes once within the TTL and again after it", () => {
      const recent = new RecentMessages(60000, 100);

      expect(recent.observe("a", 0)).toBe(true);
      expect(recent.observe("a", 1000)).toBe(false);
      expect(recent.observe("a", 61001)).toBe(true);
    });

    it("refreshes the last-seen time on every observation", () => {
      const recent = new RecentMessages(60000, 100);

      recent.observe("a", 0);
      recent.observe("a", 50000);

      expect(recent.observe("a", 100000)).toBe(false);
    });

    it("does not publish at exactly the TTL", () => {
      const recent = new RecentMessages(60000, 100);

      recent.observe("a", 0);

      expect(recent.observe("a", 60000)).toBe(false);
    });
  });

  describe("sweep", () => {
    it("drops entries older than the TTL", () => {
      const recent = new RecentMessages(60000, 100);
      recent.observe("a", 0);
      recent.observe("b", 50000);

      expect(recent.sweep(70000)).toBe(1);
      expect(recent.entries()).toEqual([{ fingerprint: "b", lastSeen: 50000 }]);
    });
  });

  describe("bounds", () => {
    it("evicts the least recently seen entry past the limit", () => {
      const recent = new RecentMessages(60000, 2);
      recent.observe("a", 1);
      recent.observe("b", 2);
      recent.observe("c", 3);

      expect(recent.size).toBe(2);
      expect(recent.entries()).toEqual([
        { fingerprint: "b", lastSeen: 2 },
        { fingerprint: "c", lastSeen: 3 },
      ]);
      expect(recent.observe("a", 4)).toBe(true);
    });

    it("treats a refreshed entry as recent", () => {
      const recent = new RecentMessages(60000, 2);
      recent.observe("a", 1);
      recent.observe("b", 2);
      recent.observe("a", 3);
      recent.observe("c", 4);

      expect(recent.entries()).toEqual([
        { fingerprint: "a", lastSeen: 3 },
        { fingerprint: "c", lastSeen: 4 },
      ]);
    });

    it("sweeps every expired entry once the limit is passed", () => {
      const recent = new RecentMessages(1000, 3);
      recent.observe("a", 0);
      recent.observe("b", 100);
      recent.observe("c", 1500);
      recent.observe("d", 1600);

      expect(recent.entries()).toEqual([
        { fingerprint: "c", lastSeen: 1500 },
        { fingerprint: "d", lastSeen: 1600 },
      ]);
    });
  });
});
