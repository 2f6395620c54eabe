/**
 * Dedup key tests
 *
 * The same log record is OCR'd on every frame while it is visible. Its key
 * must not change with OCR noise as long as the timestamp is legible,
 * otherwise the record is reported again.
 */

import { describe, it, expect } from "vitest";
import { canonicalKey, headerFallbackKey, timestampKey, NO_KEY } from "@/lib/dedup/canonicalKey";

describe("timestampKey", () => {
  it("builds a day/time key with zero-padded time", () => {
    expect(timestampKey("Day 45, 13:07:02: Tribemember Bob was killed!")).toBe("d45-t130702");
    expect(timestampKey("day 7, 4:05:09")).toBe("d7-t040509");
  });

  it("tolerates OCR noise around the timestamp", () => {
    const clean = timestampKey("Day 45, 13:07:02: Tribemember Bob was killed!");
    const noisy = timestampKey("Day  45 ,  13;07;02  Tribemember B0b was killed");
    expect(noisy).toBe(clean);
  });

  it("finds the timestamp anywhere in the text", () => {
    expect(timestampKey("(( Tribe log )) DAY 123456; 23:59:59 something")).toBe("d123456-t235959");
  });

  it("returns null without a legible timestamp", () => {
    expect(timestampKey("Day 45 13:07 Bob was killed")).toBeNull();
    expect(timestampKey("")).toBeNull();
  });
});

describe("headerFallbackKey", () => {
  it("lowercases and keeps only letters, digits, colons and semicolons", () => {
    expect(headerFallbackKey("Dav 45, 13:O7:02 - Bob!")).toBe("dav4513:o7:02bob");
  });

  it("truncates to 64 characters", () => {
    expect(headerFallbackKey("a".repeat(100))).toHaveLength(64);
  });

  it("maps an empty result to the no-key sentinel", () => {
    expect(headerFallbackKey("-- !! --")).toBe(NO_KEY);
    expect(headerFallbackKey("")).toBe(NO_KEY);
  });
});

describe("canonicalKey", () => {
  it("prefers the timestamp in the resolved text", () => {
    expect(canonicalKey("Day 10, 01:00:05: Raptor was destroyed", "Dav 1O, 01:00:05")).toBe("d10-t010005");
  });

  it("falls back to the header text", () => {
    expect(canonicalKey("Raptor was destroyed", "Dav 1O 01 00")).toBe("dav1o0100");
  });
});
