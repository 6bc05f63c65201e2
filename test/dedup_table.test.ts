import { describe, it, expect } from "vitest";

import { DedupTable } from "../src/dedup/dedup_table";

const alice = { address: "10.0.0.1", port: 5000 };
const bob = { address: "10.0.0.2", port: 5000 };

const makeClock = (start = 1_000) => {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe("DedupTable", () => {
  it("classifies a first sighting as new and a repeat as still pending", () => {
    const table = new DedupTable();

    expect(table.classify(alice, 1)).toEqual({ status: "new" });
    expect(table.classify(alice, 1)).toEqual({ status: "still_pending" });
  });

  it("replays the cached result once resolved", () => {
    const table = new DedupTable();
    const cached = Buffer.from([3, 0, 0, 0, 1]);

    table.classify(alice, 1);
    expect(table.resolve(alice, 1, cached)).toBe(true);
    expect(table.classify(alice, 1)).toEqual({ status: "resolved", cachedResult: cached });
  });

  it("resolves an entry at most once", () => {
    const table = new DedupTable();
    table.classify(alice, 1);

    expect(table.resolve(alice, 1, Buffer.from("first"))).toBe(true);
    expect(table.resolve(alice, 1, Buffer.from("second"))).toBe(false);
    expect(table.get(alice, 1)?.cachedResult?.toString()).toBe("first");
  });

  it("does not resolve unknown entries", () => {
    const table = new DedupTable();
    expect(table.resolve(alice, 9, Buffer.from("x"))).toBe(false);
  });

  it("keeps peers apart", () => {
    const table = new DedupTable();

    expect(table.classify(alice, 1).status).toBe("new");
    expect(table.classify(bob, 1).status).toBe("new");
    expect(table.classify({ address: "10.0.0.1", port: 5001 }, 1).status).toBe("new");
    expect(table.stats()).toMatchObject({ peers: 3, entries: 3 });
  });

  it("evicts the oldest entries beyond capacity, per peer", () => {
    const table = new DedupTable({ capacityPerPeer: 2 });

    table.classify(alice, 1);
    table.classify(alice, 2);
    table.classify(bob, 1);
    table.classify(alice, 3);

    expect(table.get(alice, 1)).toBeNull();
    expect(table.get(alice, 2)).not.toBeNull();
    expect(table.get(bob, 1)).not.toBeNull();
    // Evicted sequences look new again.
    expect(table.classify(alice, 1).status).toBe("new");
  });

  it("expires entries once they reach the TTL", () => {
    const clock = makeClock();
    const table = new DedupTable({ ttlMs: 1_000, now: clock.now });

    table.classify(alice, 1);
    table.resolve(alice, 1, Buffer.from("r"));

    clock.advance(999);
    expect(table.classify(alice, 1).status).toBe("resolved");

    clock.advance(1);
    expect(table.classify(alice, 1).status).toBe("new");
  });

  it("starts a resolved entry's lifetime when its result arrives", () => {
    const clock = makeClock();
    const table = new DedupTable({ ttlMs: 1_000, now: clock.now });

    table.classify(alice, 1);
    clock.advance(990);
    table.resolve(alice, 1, Buffer.from("r"));

    clock.advance(10);
    expect(table.classify(alice, 1).status).toBe("resolved");

    clock.advance(989);
    expect(table.classify(alice, 1).status).toBe("resolved");

    clock.advance(1);
    expect(table.classify(alice, 1).status).toBe("new");
  });

  it("keeps a freshly resolved entry over older pending ones at capacity", () => {
    const table = new DedupTable({ capacityPerPeer: 2 });

    table.classify(alice, 1);
    table.classify(alice, 2);
    table.resolve(alice, 1, Buffer.from("r"));
    table.classify(alice, 3);

    expect(table.get(alice, 1)?.cachedResult).toEqual(Buffer.from("r"));
    expect(table.get(alice, 2)).toBeNull();
  });

  it("sweeps every peer and forgets empty ones", () => {
    const clock = makeClock();
    const table = new DedupTable({ ttlMs: 100, now: clock.now });

    table.classify(alice, 1);
    table.classify(bob, 1);
    clock.advance(50);
    table.classify(bob, 2);
    clock.advance(50);

    expect(table.sweep()).toBe(2);
    expect(table.stats()).toMatchObject({ peers: 1, entries: 1 });
    expect(table.get(bob, 2)).not.toBeNull();
  });

  it("spaces acknowledgement re-sends when an interval is set", () => {
    const clock = makeClock();
    const table = new DedupTable({ now: clock.now });
    table.classify(alice, 1);

    expect(table.allowAckResend(alice, 1, 0)).toBe(true);
    expect(table.allowAckResend(alice, 1, 500)).toBe(false);

    clock.advance(500);
    expect(table.allowAckResend(alice, 1, 500)).toBe(true);
    expect(table.allowAckResend(alice, 1, 500)).toBe(false);
  });

  it("clamps capacity and TTL to at least one", () => {
    const table = new DedupTable({ capacityPerPeer: 0, ttlMs: 0 });
    expect(table.stats()).toMatchObject({ capacityPerPeer: 1, ttlMs: 1 });
  });
});
