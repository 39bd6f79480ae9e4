import { createGateway } from "../src/bootstrap.js";
import { parseConfig } from "../src/config.js";
import type { ProviderAdapter } from "../src/dispatcher.js";
import type { CompletionInput, GatewayEvent } from "../src/types.js";

export interface ProviderFixture {
  name: string;
  adapter: ProviderAdapter;
  costPer1kInput?: number;
  costPer1kOutput?: number;
  capabilities?: string[];
  maxConcurrency?: number;
}

/** Builds a gateway over the given adapters, recording every published event. */
export function setup(providers: ProviderFixture[], overrides: Record<string, unknown> = {}) {
  const config = parseConfig({
    providers: providers.map((p) => ({
      name: p.name,
      capabilities: p.capabilities ?? ["chat"],
      costPer1kInput: p.costPer1kInput ?? 0.01,
      costPer1kOutput: p.costPer1kOutput ?? 0.01,
      maxConcurrency: p.maxConcurrency ?? 4,
      adapter: { type: "mock" },
    })),
    resilience: { failureThreshold: 3, cooldownMs: 60_000, maxRetries: 2, backoffBaseMs: 1 },
    ...overrides,
  });
  const adapters: Record<string, ProviderAdapter> = {};
  for (const p of providers) adapters[p.name] = p.adapter;
  const { gateway, metrics } = createGateway(config, { adapters, log: false, random: () => 0 });

  const events: GatewayEvent[] = [];
  gateway.bus.subscribe((e) => {
    events.push(e);
  });
  const typesFor = (requestId: string) => events.filter((e) => e.requestId === requestId).map((e) => e.type);
  return { gateway, metrics, events, typesFor };
}

export function ask(content: string, extra: Partial<CompletionInput> = {}): CompletionInput {
  return {
    messages: [{ role: "user", content }],
    capabilities: ["chat"],
    principal: "alice",
    maxTokens: 100,
    ...extra,
  };
}
