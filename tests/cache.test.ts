import { afterEach, describe, expect, it, vi } from "vitest";
import { CacheLayer, MemoryCacheStore, fingerprint, type CacheStore } from "../src/cache.js";
import type { CacheEntry, CompletionResponse } from "../src/types.js";
import { makeRequest } from "./fixtures.js";

function response(content = "x"): CompletionResponse {
  return {
    requestId: "r1",
    provider: "a",
    content,
    usage: { input: 1, output: 1, total: 2 },
    latencyMs: 5,
    cached: false,
  };
}

class BrokenStore implements CacheStore {
  get(): CacheEntry | undefined {
    throw new Error("store down");
  }
  peek(): CacheEntry | undefined {
    throw new Error("store down");
  }
  set(): void {
    throw new Error("store down");
  }
  delete(): boolean {
    throw new Error("store down");
  }
  keys(): IterableIterator<string> {
    throw new Error("store down");
  }
  clear(): void {
    throw new Error("store down");
  }
  get size(): number {
    return 0;
  }
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("fingerprint", () => {
  it("ignores whitespace differences and capability order", () => {
    const a = fingerprint(makeRequest({ messages: [{ role: "user", content: "  hello \n  world " }] }));
    const b = fingerprint(makeRequest({ messages: [{ role: "user", content: "hello world" }] }));
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);

    const c = fingerprint(makeRequest({ capabilities: ["chat", "reasoning"] }));
    const d = fingerprint(makeRequest({ capabilities: ["reasoning", "chat"] }));
    expect(c).toBe(d);
  });

  it("ignores who is asking", () => {
    expect(fingerprint(makeRequest({ principal: "alice", id: "1" }))).toBe(
      fingerprint(makeRequest({ principal: "bob", id: "2" })),
    );
  });

  it("separates requests that can produce different output", () => {
    const base = fingerprint(makeRequest());
    expect(fingerprint(makeRequest({ temperature: 0.9 }))).not.toBe(base);
    expect(fingerprint(makeRequest({ maxTokens: 65 }))).not.toBe(base);
    expect(fingerprint(makeRequest({ preferredProvider: "a" }))).not.toBe(base);
    expect(fingerprint(makeRequest({ messages: [{ role: "system", content: "hello there" }] }))).not.toBe(base);
  });
});

describe("CacheLayer", () => {
  it("returns a hit until the TTL elapses, then evicts lazily", () => {
    let t = 1_000;
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 }, new MemoryCacheStore(), () => t);

    cache.put("f1", response());
    const first = cache.get("f1");
    expect(first.hit).toBe(true);
    expect(first.entry?.hitCount).toBe(1);
    expect(first.entry?.response.content).toBe("x");

    t += 99;
    expect(cache.get("f1").hit).toBe(true);

    t += 1;
    expect(cache.get("f1").hit).toBe(false);
    expect(cache.size).toBe(0);
  });

  it("stores a copy of the response", () => {
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 });
    const original = response("before");
    cache.put("f1", original);
    original.content = "after";
    original.usage.total = 99;

    expect(cache.get("f1").entry?.response.content).toBe("before");
    expect(cache.get("f1").entry?.response.usage.total).toBe(2);
  });

  it("evicts the least recently used entry past maxEntries", () => {
    const cache = new CacheLayer({ maxEntries: 2, defaultTtlMs: 1_000 });
    cache.put("f1", response());
    cache.put("f2", response());
    cache.get("f1");
    cache.put("f3", response());

    expect(cache.size).toBe(2);
    expect(cache.get("f2").hit).toBe(false);
    expect(cache.get("f1").hit).toBe(true);
    expect(cache.get("f3").hit).toBe(true);
  });

  it("does not store when the TTL or capacity is zero", () => {
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 });
    cache.put("f1", response(), 0);
    expect(cache.size).toBe(0);

    const disabled = new CacheLayer({ maxEntries: 0, defaultTtlMs: 100 });
    disabled.put("f1", response());
    expect(disabled.size).toBe(0);
  });

  it("refreshes the entry on every hit under the sliding policy", () => {
    let t = 1_000;
    const cache = new CacheLayer(
      { maxEntries: 10, defaultTtlMs: 100, ttlPolicy: "sliding" },
      new MemoryCacheStore(),
      () => t,
    );
    cache.put("f1", response());

    t = 1_080;
    expect(cache.get("f1").hit).toBe(true);
    t = 1_150;
    expect(cache.get("f1").hit).toBe(true);
    t = 1_250;
    expect(cache.get("f1").hit).toBe(false);
  });

  it("sweeps expired entries and keeps live ones", () => {
    let t = 1_000;
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 }, new MemoryCacheStore(), () => t);
    cache.put("short", response());
    cache.put("long", response(), 500);

    t = 1_200;
    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get("long").hit).toBe(true);
  });

  it("runs the sweeper on its interval until stopped", () => {
    vi.useFakeTimers();
    let t = 0;
    const cache = new CacheLayer(
      { maxEntries: 10, defaultTtlMs: 100, sweepIntervalMs: 50 },
      new MemoryCacheStore(),
      () => t,
    );
    cache.put("f1", response());
    cache.startSweeper();

    t = 200;
    vi.advanceTimersByTime(50);
    expect(cache.size).toBe(0);

    cache.stopSweeper();
    cache.put("f2", response());
    t = 400;
    vi.advanceTimersByTime(200);
    expect(cache.size).toBe(1);
  });

  it("invalidates single entries and clears everything", () => {
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 });
    cache.put("f1", response());
    cache.put("f2", response());

    expect(cache.invalidate("f1")).toBe(true);
    expect(cache.invalidate("f1")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("degrades to a miss when the store fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const cache = new CacheLayer({ maxEntries: 10, defaultTtlMs: 100 }, new BrokenStore());

    expect(() => cache.put("f1", response())).not.toThrow();
    expect(cache.get("f1")).toEqual({ hit: false });
    expect(cache.invalidate("f1")).toBe(false);
    expect(cache.sweep()).toBe(0);
    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith("[Cache] lookup failed, treating as miss: store down");
  });
});
