import { afterEach, describe, expect, it, vi } from "vitest";
import { EventBus, attachConsoleLog } from "../src/events.js";
import type { GatewayEvent } from "../src/types.js";

const completed = {
  type: "RequestCompleted",
  requestId: "req-0001-xyz",
  timestamp: 1_000,
  provider: "a",
  cached: false,
  latencyMs: 12,
} satisfies GatewayEvent;

afterEach(() => {
  vi.restoreAllMocks();
});

describe("EventBus", () => {
  it("delivers to handlers in subscription order", () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.subscribe(() => {
      seen.push("first");
    });
    bus.subscribe(() => {
      seen.push("second");
    });

    bus.publish(completed);
    expect(seen).toEqual(["first", "second"]);
  });

  it("isolates a throwing handler from the others and from the publisher", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const bus = new EventBus();
    const seen: GatewayEvent[] = [];
    bus.subscribe(() => {
      throw new Error("broken handler");
    });
    bus.subscribe((e) => {
      seen.push(e);
    });

    expect(() => bus.publish(completed)).not.toThrow();
    expect(seen).toEqual([completed]);
    expect(warn).toHaveBeenCalledWith("[Bus] subscriber failed on RequestCompleted (req-0001-xyz): broken handler");
  });

  it("logs a rejected async handler", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const bus = new EventBus();
    bus.subscribe(async () => {
      throw new Error("late failure");
    });

    bus.publish(completed);
    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith("[Bus] subscriber failed on RequestCompleted (req-0001-xyz): late failure");
    });
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(handler);
    expect(bus.subscriberCount).toBe(1);

    unsubscribe();
    bus.publish(completed);
    expect(bus.subscriberCount).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});

describe("attachConsoleLog", () => {
  it("prints one line per notable event", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const bus = new EventBus();
    attachConsoleLog(bus);

    bus.publish(completed);
    bus.publish({ ...completed, cached: true, latencyMs: 1 });
    bus.publish({ type: "RequestFailed", requestId: "req-0002-xyz", timestamp: 1_000, code: "BUDGET_EXCEEDED", message: "no" });
    bus.publish({ type: "CacheMiss", requestId: "req-0003-xyz", timestamp: 1_000, fingerprint: "f" });

    expect(log.mock.calls).toEqual([
      ["[Gateway] req-0001 done via a in 12ms"],
      ["[Gateway] req-0001 done via a (cached) in 1ms"],
    ]);
    expect(warn.mock.calls).toEqual([["[Gateway] req-0002 failed: BUDGET_EXCEEDED no"]]);
  });

  it("names the upstream model behind a successful call", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const bus = new EventBus();
    attachConsoleLog(bus);

    bus.publish({
      type: "ProviderCallSucceeded",
      requestId: "req-0004-xyz",
      timestamp: 1_000,
      provider: "openai",
      model: "gpt-test",
      latencyMs: 30,
      usage: { input: 10, output: 5, total: 15 },
      cost: 0.0125,
    });

    expect(log.mock.calls).toEqual([["[Gateway] req-0004 openai answered with gpt-test for 0.0125"]]);
  });
});
