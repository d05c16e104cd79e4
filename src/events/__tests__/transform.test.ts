/**
 * Events Transform Tests
 *
 * Fingerprints and the re-publish rule.
 */
import { describe, expect, it } from "vitest";

import type { HubMessage } from "../../buffer/index.js";
import {
  canonicalMessage,
  fingerprintMessage,
  isNewsworthy,
} from "../transform.js";

const onMessage: HubMessage = {
  from: "112233",
  to: "AABBCC",
  flags: "2B",
  status: 255,
  type: { kind: "on" },
};

describe("Events Transform", () => {
  describe("canonicalMessage", () => {
    it("lists the fields in a fixed order", () => {
      expect(canonicalMessage(onMessage)).toBe('["112233","AABBCC","2B",255,"on"]');
    });

    it("flattens opaque codes", () => {
      const message: HubMessage = {
        ...onMessage,
        status: { kind: "unknown", cmd1: "2E", cmd2: "05" },
        type: { kind: "unknown", cmd1: "2E" },
      };

      expect(canonicalMessage(message)).toBe(
        '["112233","AABBCC","2B",["unknown","2E","05"],["unknown","2E"]]',
      );
    });
  });

  describe("fingerprintMessage", () => {
    it("is a 40-character hex digest", () => {
      expect(fingerprintMessage(onMessage)).toMatch(/^[0-9a-f]{40}$/);
    });

    it("is equal for equal messages", () => {
      expect(fingerprintMessage({ ...onMessage })).toBe(fingerprintMessage(onMessage));
    });

    it("changes with the status", () => {
      expect(fingerprintMessage({ ...onMessage, status: 128 })).not.toBe(
        fingerprintMessage(onMessage),
      );
    });
  });

  describe("isNewsworthy", () => {
    it("publishes unseen messages", () => {
      expect(isNewsworthy(undefined, 0, 60000)).toBe(true);
    });

    it("holds back messages seen within the TTL", () => {
      expect(isNewsworthy(1000, 61000, 60000)).toBe(false);
    });

    it("publishes messages last seen more than the TTL ago", () => {
      expect(isNewsworthy(1000, 61001, 60000)).toBe(true);
    });
  });
});
