import { describe, expect, it } from "vitest";
import { EventDeduplicator } from "./event-deduplicator.js";

function makeClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("EventDeduplicator", () => {
  it("passes the first delivery and rejects the replay", () => {
    const dedup = new EventDeduplicator();
    expect(dedup.checkAndInsert("msg:a")).toBe(true);
    expect(dedup.checkAndInsert("msg:a")).toBe(false);
    expect(dedup.checkAndInsert("msg:b")).toBe(true);
  });

  it("forgets fingerprints once the window has elapsed", () => {
    const clock = makeClock();
    const dedup = new EventDeduplicator({ windowMs: 1000, now: clock.now });

    dedup.checkAndInsert("msg:a");
    clock.advance(999);
    expect(dedup.checkAndInsert("msg:a")).toBe(false);

    clock.advance(1);
    expect(dedup.checkAndInsert("msg:a")).toBe(true);
  });

  it("evicts the oldest entry when the size backstop is reached", () => {
    const clock = makeClock();
    const dedup = new EventDeduplicator({ maxEntries: 2, now: clock.now });

    dedup.checkAndInsert("one");
    clock.advance(1);
    dedup.checkAndInsert("two");
    clock.advance(1);
    dedup.checkAndInsert("three");

    expect(dedup.size).toBe(2);
    expect(dedup.has("one")).toBe(false);
    expect(dedup.has("two")).toBe(true);
    expect(dedup.has("three")).toBe(true);
  });

  it("has() leaves the entry in place", () => {
    const dedup = new EventDeduplicator();
    dedup.checkAndInsert("sent-1");
    expect(dedup.has("sent-1")).toBe(true);
    expect(dedup.has("sent-1")).toBe(true);
    expect(dedup.checkAndInsert("sent-1")).toBe(false);
  });

  it("only one of many same-tick deliveries passes", async () => {
    const dedup = new EventDeduplicator();
    const results = await Promise.all(
      Array.from({ length: 5 }, async () => dedup.checkAndInsert("msg:concurrent")),
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it("rejects a non-positive size bound", () => {
    expect(() => new EventDeduplicator({ maxEntries: 0 })).toThrow(RangeError);
  });
});
