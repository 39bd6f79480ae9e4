import { CacheLayer, type CacheStore } from "./cache.js";
import { resolveApiKey, type AdapterConfig, type GatewayConfig } from "./config.js";
import { MockAdapter, OpenAICompatibleAdapter, type ProviderAdapter } from "./dispatcher.js";
import { EventBus, attachConsoleLog } from "./events.js";
import { Gateway } from "./Gateway.js";
import { CostLedger } from "./ledger.js";
import { GatewayMetrics } from "./metrics.js";
import { ProviderRegistry } from "./registry.js";
import { ResilienceLayer } from "./resilience.js";
import { LatencyTracker, createStrategy } from "./router.js";
import type { Clock } from "./types.js";

export interface CreateGatewayOptions {
  env?: NodeJS.ProcessEnv;
  now?: Clock;
  random?: () => number;
  /** Adapters by provider name, used instead of the configured adapter. */
  adapters?: Record<string, ProviderAdapter>;
  cacheStore?: CacheStore;
  fetchImpl?: typeof fetch;
  /** Log gateway events to the console (default true). */
  log?: boolean;
}

export interface GatewayParts {
  gateway: Gateway;
  metrics: GatewayMetrics;
}

export function createAdapter(
  provider: string,
  config: AdapterConfig,
  env: NodeJS.ProcessEnv,
  fetchImpl?: typeof fetch,
): ProviderAdapter {
  switch (config.type) {
    case "openai-compatible":
      return new OpenAICompatibleAdapter({
        baseUrl: config.baseUrl,
        model: config.model,
        apiKey: resolveApiKey(provider, config.apiKeyEnv, env),
        topP: config.topP,
        fetchImpl,
      });
    case "mock":
      return new MockAdapter(provider, {
        reply: config.reply,
        latencyMs: config.latencyMs,
        usage: config.usage,
        failures: config.failures,
        failAlways: config.failAlways,
      });
  }
}

/** Builds every component from config and wires them into one Gateway. */
export function createGateway(config: GatewayConfig, opts: CreateGatewayOptions = {}): GatewayParts {
  const env = opts.env ?? process.env;
  const now = opts.now ?? Date.now;

  const registry = new ProviderRegistry(
    config.providers.map((p) => ({
      name: p.name,
      capabilities: p.capabilities,
      costPer1kInput: p.costPer1kInput,
      costPer1kOutput: p.costPer1kOutput,
      maxConcurrency: p.maxConcurrency,
      adapter: opts.adapters?.[p.name] ?? createAdapter(p.name, p.adapter, env, opts.fetchImpl),
    })),
  );

  const resilience = new ResilienceLayer(config.resilience, now, opts.random);
  const cache = new CacheLayer(config.cache, opts.cacheStore, now);
  const ledger = new CostLedger(config.budgets, config.defaultBudget, now);
  const latency = new LatencyTracker(config.routing.latencyWindow);
  const router = createStrategy(config.routing, latency);

  const bus = new EventBus();
  const metrics = new GatewayMetrics(now);
  metrics.attach(bus);
  if (opts.log ?? true) attachConsoleLog(bus);

  const gateway = new Gateway({
    registry,
    resilience,
    cache,
    ledger,
    router,
    bus,
    latency,
    defaults: config.defaults,
    now,
  });
  return { gateway, metrics };
}
