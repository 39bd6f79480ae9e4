/**
 * Orders the candidate providers for a request. The result is an attempt
 * list, not a single pick: the gateway falls through it on failure.
 *
 * Policies:
 *
 * 1. cost  (default)
 *    Ascending estimated cost for this request (input tokens + maxTokens).
 *
 * 2. latency
 *    Ascending rolling-average latency. Providers with no samples yet sort
 *    first so they get measured.
 *
 * 3. round-robin
 *    Rotates through the candidates with a counter shared by all requests.
 *
 * 4. pinned
 *    request.preferredProvider first when it is a candidate; the rest in
 *    the order of a secondary policy.
 *
 * 5. fallback
 *    A configured static chain; providers not in the chain follow in
 *    registration order.
 *
 * Ties keep registration order (Array.prototype.sort is stable), so equal
 * providers are always tried in the same order.
 */

import { estimateCost } from "./ledger.js";
import type { CompletionRequest, ProviderDescriptor } from "./types.js";

export type Policy = "cost" | "latency" | "round-robin" | "pinned" | "fallback";

export interface RoutingStrategy {
  readonly name: Policy;
  select(request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[];
}

function sortBy(
  candidates: readonly ProviderDescriptor[],
  score: (p: ProviderDescriptor) => number,
): ProviderDescriptor[] {
  return [...candidates].sort((a, b) => score(a) - score(b));
}

export class CostOptimalStrategy implements RoutingStrategy {
  readonly name = "cost";

  select(request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[] {
    const costs = new Map(candidates.map((p) => [p.name, estimateCost(request, p)]));
    return sortBy(candidates, (p) => costs.get(p.name) ?? 0);
  }
}

/** Rolling average over the last `window` successful call latencies. */
export class LatencyTracker {
  private readonly samples = new Map<string, number[]>();

  constructor(private readonly window = 20) {}

  record(provider: string, latencyMs: number): void {
    const list = this.samples.get(provider) ?? [];
    list.push(latencyMs);
    if (list.length > this.window) list.shift();
    this.samples.set(provider, list);
  }

  average(provider: string): number | undefined {
    const list = this.samples.get(provider);
    if (!list || list.length === 0) return undefined;
    return list.reduce((a, b) => a + b, 0) / list.length;
  }
}

export class LatencyOptimalStrategy implements RoutingStrategy {
  readonly name = "latency";

  constructor(private readonly tracker: LatencyTracker) {}

  select(_request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[] {
    return sortBy(candidates, (p) => this.tracker.average(p.name) ?? 0);
  }
}

export class RoundRobinStrategy implements RoutingStrategy {
  readonly name = "round-robin";
  private counter = 0;

  select(_request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[] {
    if (candidates.length === 0) return [];
    const start = this.counter % candidates.length;
    this.counter++;
    return [...candidates.slice(start), ...candidates.slice(0, start)];
  }
}

export class PinnedStrategy implements RoutingStrategy {
  constructor(
    private readonly secondary: RoutingStrategy,
    readonly name: Policy = "pinned",
  ) {}

  select(request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[] {
    const preferred = request.preferredProvider
      ? candidates.find((p) => p.name === request.preferredProvider)
      : undefined;
    if (!preferred) return this.secondary.select(request, candidates);

    const rest = candidates.filter((p) => p !== preferred);
    return [preferred, ...this.secondary.select(request, rest)];
  }
}

export class FallbackChainStrategy implements RoutingStrategy {
  readonly name = "fallback";

  constructor(private readonly chain: readonly string[]) {}

  select(_request: CompletionRequest, candidates: readonly ProviderDescriptor[]): ProviderDescriptor[] {
    const rank = (p: ProviderDescriptor) => {
      const idx = this.chain.indexOf(p.name);
      return idx === -1 ? this.chain.length : idx;
    };
    return sortBy(candidates, rank);
  }
}

export interface RoutingOptions {
  policy: Policy;
  secondary?: Exclude<Policy, "pinned">;
  chain?: string[];
}

/**
 * Builds the configured strategy. Every policy except `pinned` itself is
 * wrapped in pinning so preferredProvider is always honored.
 */
export function createStrategy(opts: RoutingOptions, tracker: LatencyTracker): RoutingStrategy {
  const base = (policy: Exclude<Policy, "pinned">): RoutingStrategy => {
    switch (policy) {
      case "cost":
        return new CostOptimalStrategy();
      case "latency":
        return new LatencyOptimalStrategy(tracker);
      case "round-robin":
        return new RoundRobinStrategy();
      case "fallback":
        return new FallbackChainStrategy(opts.chain ?? []);
    }
  };

  if (opts.policy === "pinned") return new PinnedStrategy(base(opts.secondary ?? "cost"));
  return new PinnedStrategy(base(opts.policy), opts.policy);
}
