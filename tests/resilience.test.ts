import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MockAdapter, type ProviderAdapter } from "../src/dispatcher.js";
import {
  CircuitOpenError,
  DeadlineExceededError,
  ProviderError,
  ProviderPermanentError,
  ProviderTransientError,
} from "../src/errors.js";
import { ResilienceLayer, classify, type ResilienceSettings } from "../src/resilience.js";
import { makeRequest } from "./fixtures.js";

const base: ResilienceSettings = {
  failureThreshold: 5,
  cooldownMs: 1_000,
  windowMs: 60_000,
  maxRetries: 2,
  backoffBaseMs: 1,
};

function run(layer: ResilienceLayer, adapter: ProviderAdapter, deadline = Date.now() + 5_000) {
  return layer.execute("p", adapter, makeRequest({ deadline }), { requestId: "req-0001", deadline });
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ResilienceLayer.execute", () => {
  it("retries transient failures until a call succeeds", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failures: ["transient", "transient"] });

    const outcome = await run(layer, adapter);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.value.attempts).toBe(3);
    expect(adapter.calls).toBe(3);
  });

  it("gives up after maxRetries", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failAlways: "transient" });

    const outcome = await run(layer, adapter);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(ProviderTransientError);
    expect(adapter.calls).toBe(3);
  });

  it("never retries a permanent failure", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failures: ["permanent"] });

    const outcome = await run(layer, adapter);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(ProviderPermanentError);
    expect(adapter.calls).toBe(1);
    expect(layer.breaker("p").snapshot().failureCount).toBe(0);
  });

  it("retries an unknown failure exactly once", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failAlways: "unknown" });

    const outcome = await run(layer, adapter);

    expect(adapter.calls).toBe(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ProviderTransientError);
      expect(outcome.error).toHaveProperty("unknown", true);
    }
  });

  it("treats a plain thrown error as unknown", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    let calls = 0;
    const adapter: ProviderAdapter = {
      generate: async () => {
        calls++;
        throw new Error("boom");
      },
    };

    const outcome = await run(layer, adapter);

    expect(calls).toBe(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.message).toBe("p: boom");
  });

  it("stops retrying once its own failures open the circuit", async () => {
    const layer = new ResilienceLayer({ ...base, failureThreshold: 2, maxRetries: 5 }, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failAlways: "transient" });
    const opened: string[] = [];

    const deadline = Date.now() + 5_000;
    const outcome = await layer.execute("p", adapter, makeRequest({ deadline }), {
      requestId: "req-0001",
      deadline,
      onTransition: (t) => opened.push(t.to),
    });

    expect(adapter.calls).toBe(2);
    expect(opened).toEqual(["OPEN"]);
    expect(layer.stateOf("p")).toBe("OPEN");
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(ProviderTransientError);
  });

  it("does not sleep through a backoff once the circuit has opened", async () => {
    const layer = new ResilienceLayer({ ...base, failureThreshold: 1, maxRetries: 3, backoffBaseMs: 1_000 }, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failAlways: "transient" });
    const started = Date.now();

    const outcome = await run(layer, adapter);

    expect(Date.now() - started).toBeLessThan(250);
    expect(adapter.calls).toBe(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(ProviderTransientError);
  });

  it("fails fast while the circuit is open", async () => {
    const layer = new ResilienceLayer({ ...base, failureThreshold: 1 }, Date.now, () => 0);
    const breaker = layer.breaker("p");
    breaker.onFailure(breaker.admit());
    const adapter = new MockAdapter("p");

    const outcome = await run(layer, adapter);

    expect(adapter.calls).toBe(0);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(CircuitOpenError);
  });

  it("lets exactly one concurrent trial through a half-open circuit", async () => {
    let t = 0;
    const layer = new ResilienceLayer({ ...base, failureThreshold: 1 }, () => t, () => 0);
    const breaker = layer.breaker("p");
    breaker.onFailure(breaker.admit());
    t = 1_000;
    const adapter = new MockAdapter("p", { latencyMs: 20 });

    const deadline = t + 5_000;
    const [first, second] = await Promise.all([run(layer, adapter, deadline), run(layer, adapter, deadline)]);

    expect(first.ok).toBe(true);
    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error).toBeInstanceOf(CircuitOpenError);
    expect(adapter.calls).toBe(1);
    expect(layer.stateOf("p")).toBe("CLOSED");
  });

  it("aborts a call that outlives the deadline", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { latencyMs: 200 });
    const started = Date.now();

    const outcome = await run(layer, adapter, Date.now() + 50);

    expect(Date.now() - started).toBeLessThan(190);
    expect(adapter.calls).toBe(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(DeadlineExceededError);
    expect(layer.breaker("p").snapshot().failureCount).toBe(0);
  });

  it("cuts the backoff sleep short at the deadline", async () => {
    const layer = new ResilienceLayer({ ...base, backoffBaseMs: 1_000 }, Date.now, () => 0);
    const adapter = new MockAdapter("p", { failAlways: "transient" });
    const started = Date.now();

    const outcome = await run(layer, adapter, Date.now() + 100);

    expect(Date.now() - started).toBeLessThan(400);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(DeadlineExceededError);
  });

  it("ends the call when the caller aborts", async () => {
    const layer = new ResilienceLayer(base, Date.now, () => 0);
    const adapter = new MockAdapter("p", { latencyMs: 200 });
    const controller = new AbortController();
    const deadline = Date.now() + 5_000;

    const pending = layer.execute("p", adapter, makeRequest({ deadline }), {
      requestId: "req-0001",
      deadline,
      signal: controller.signal,
    });
    controller.abort();
    const outcome = await pending;

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(DeadlineExceededError);
  });
});

describe("backoff", () => {
  it("doubles per attempt with jitter in [0.5, 1] and a ceiling", () => {
    const low = new ResilienceLayer({ ...base, backoffBaseMs: 100 }, Date.now, () => 0);
    expect(low.backoff(0)).toBe(50);
    expect(low.backoff(1)).toBe(100);
    expect(low.backoff(3)).toBe(400);

    const high = new ResilienceLayer({ ...base, backoffBaseMs: 100, maxBackoffMs: 300 }, Date.now, () => 1);
    expect(high.backoff(1)).toBe(200);
    expect(high.backoff(3)).toBe(300);
  });
});

describe("classify", () => {
  it("maps adapter errors onto the gateway taxonomy", () => {
    const permanent = classify("p", new ProviderError("permanent", "bad key", 401));
    expect(permanent).toBeInstanceOf(ProviderPermanentError);
    expect(permanent.message).toBe("p: bad key");
    expect(permanent).toHaveProperty("upstreamStatus", 401);

    const transient = classify("p", new ProviderError("transient", "busy", 503));
    expect(transient).toBeInstanceOf(ProviderTransientError);
    expect(transient).toHaveProperty("unknown", false);

    expect(classify("p", "weird")).toHaveProperty("unknown", true);
  });
});
