import { describe, it, expect } from "vitest";
import { DedupRegistry } from "@/lib/dedup/dedupRegistry";
import { TtlSet } from "@/lib/dedup/ttlSet";
import { createHash } from "crypto";
import { eventKey } from "@/lib/dedup/eventKey";

describe("DedupRegistry", () => {
  it("reports a key as seen after marking it, marking twice is harmless", () => {
    const registry = new DedupRegistry();
    registry.mark("d10-t010000");
    registry.mark("d10-t010000");

    expect(registry.has("d10-t010000")).toBe(true);
    expect(registry.size).toBe(1);
  });

  it("keeps distinct keys apart", () => {
    const registry = new DedupRegistry();
    registry.mark("d10-t010000");
    registry.mark("d10-t010005");

    expect(registry.has("d10-t010000")).toBe(true);
    expect(registry.has("d10-t010005")).toBe(true);
    expect(registry.has("d10-t010009")).toBe(false);
  });

  it("starts empty for every run", () => {
    const first = new DedupRegistry();
    first.mark("nokey");
    expect(new DedupRegistry().has("nokey")).toBe(false);
  });
});

describe("TtlSet", () => {
  it("forgets keys once their time to live has passed", () => {
    let now = 1_000_000;
    const set = new TtlSet({ ttlSeconds: 60, now: () => now });
    set.add("a");

    now += 60_000;
    expect(set.has("a")).toBe(true);

    now += 1;
    expect(set.has("a")).toBe(false);
    expect(set.size).toBe(0);
  });

  it("drops the oldest entries when over capacity", () => {
    const set = new TtlSet({ ttlSeconds: 60, maxSize: 2, now: () => 0 });
    set.add("a");
    set.add("b");
    set.add("c");

    expect(set.has("a")).toBe(false);
    expect(set.has("b")).toBe(true);
    expect(set.has("c")).toBe(true);
    expect(set.size).toBe(2);
  });

  it("evicts lazily, only from the front, on lookup", () => {
    let now = 0;
    const set = new TtlSet({ ttlSeconds: 10, now: () => now });
    set.add("old");
    now = 5_000;
    set.add("new");

    now = 12_000;
    expect(set.size).toBe(2);
    expect(set.has("new")).toBe(true);
    expect(set.size).toBe(1);
  });
});

describe("eventKey", () => {
  it("hashes the text with SHA-1", () => {
    expect(eventKey("abc")).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
  });

  it("differs for different text", () => {
    expect(eventKey("Raptor was killed")).not.toBe(eventKey("Raptor was killed!"));
  });

  it("ignores box and color unless text-only is turned off", () => {
    const box = { x: 10, y: 20, w: 300, h: 18 };
    expect(eventKey("abc", box, [255, 0, 0])).toBe(eventKey("abc"));
    expect(eventKey("abc", null, [255, 0, 0], false)).toBe(eventKey("abc"));
  });

  it("hashes text, box and color together when text-only is off", () => {
    const box = { x: 10, y: 20, w: 300, h: 18 };
    const sha1 = (value: string) => createHash("sha1").update(value).digest("hex");

    expect(eventKey("abc", box, [255, 0, 0], false)).toBe(sha1("abc|10,20,300,18|255,0,0"));
    expect(eventKey("abc", box, null, false)).toBe(sha1("abc|10,20,300,18|"));
    expect(eventKey("abc", { ...box, y: 40 }, null, false)).not.toBe(eventKey("abc", box, null, false));
  });
});
