/**
 * metrics.ts
 * ──────────
 * In-memory metrics fed by the event bus. One instance per gateway.
 *
 * P95 latency:
 *   Sort the latency array and take the index at the 95th percentile.
 *   Latencies are kept for the last MAX_LATENCIES completed requests.
 *
 * Bucketed time-series:
 *   A rolling window of 5-second buckets (MAX_BUCKETS of them) for
 *   "requests over time" without storing every data point.
 */

import type { EventBus } from "./events.js";
import type { Clock, GatewayEvent } from "./types.js";

interface ProviderMetrics {
  requests: number;
  errors: number;
  totalLatency: number;
  cost: number;
}

interface TimeBucket {
  ts: number; // bucket start (unix ms)
  requests: number;
  errors: number;
  totalLatency: number;
}

const BUCKET_SIZE_MS = 5_000;
const MAX_BUCKETS = 120; // 10 minutes of history
const MAX_LATENCIES = 5_000;

function calcP95(arr: number[]): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = Math.ceil(0.95 * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

function calcAvg(arr: number[]): number {
  if (arr.length === 0) return 0;
  return arr.reduce((a, b) => a + b, 0) / arr.length;
}

function pct(part: number, whole: number): string {
  return ((part / Math.max(whole, 1)) * 100).toFixed(1) + "%";
}

export class GatewayMetrics {
  private latencies: number[] = [];
  private totalRequests = 0;
  private totalErrors = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private circuitOpens = 0;
  private budgetRejections = 0;
  private providers: Record<string, ProviderMetrics> = {};
  private timeBuckets: TimeBucket[] = [];

  constructor(private readonly now: Clock = Date.now) {}

  attach(bus: EventBus): () => void {
    return bus.subscribe((event) => this.record(event));
  }

  record(event: GatewayEvent): void {
    switch (event.type) {
      case "CacheHit":
        this.cacheHits++;
        break;
      case "CacheMiss":
        this.cacheMisses++;
        break;
      case "CircuitOpened":
        this.circuitOpens++;
        break;
      case "BudgetExceeded":
        this.budgetRejections++;
        break;
      case "ProviderCallSucceeded": {
        const m = this.provider(event.provider);
        m.requests++;
        m.totalLatency += event.latencyMs;
        m.cost += event.cost;
        break;
      }
      case "ProviderCallFailed": {
        const m = this.provider(event.provider);
        m.requests++;
        m.errors++;
        break;
      }
      case "RequestCompleted":
        this.finish(true, event.latencyMs);
        break;
      case "RequestFailed":
        this.finish(false, 0);
        break;
      default:
        break;
    }
  }

  getStats() {
    const perProvider: Record<
      string,
      { requests: number; errors: number; errorRate: string; avgLatencyMs: string; cost: number }
    > = {};

    for (const [name, m] of Object.entries(this.providers)) {
      const successes = m.requests - m.errors;
      perProvider[name] = {
        requests: m.requests,
        errors: m.errors,
        errorRate: pct(m.errors, m.requests),
        avgLatencyMs: (m.totalLatency / Math.max(successes, 1)).toFixed(1),
        cost: m.cost,
      };
    }

    return {
      totalRequests: this.totalRequests,
      totalErrors: this.totalErrors,
      errorRate: pct(this.totalErrors, this.totalRequests),
      avgLatencyMs: calcAvg(this.latencies).toFixed(1),
      p95LatencyMs: calcP95(this.latencies).toFixed(1),
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        hitRate: pct(this.cacheHits, this.cacheHits + this.cacheMisses),
      },
      circuitOpens: this.circuitOpens,
      budgetRejections: this.budgetRejections,
      perProvider,
      timeBuckets: this.timeBuckets.map((b) => ({
        ts: b.ts,
        requests: b.requests,
        errorRate: pct(b.errors, b.requests),
        avgLatencyMs: (b.totalLatency / Math.max(b.requests - b.errors, 1)).toFixed(1),
      })),
    };
  }

  reset(): void {
    this.latencies = [];
    this.totalRequests = 0;
    this.totalErrors = 0;
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.circuitOpens = 0;
    this.budgetRejections = 0;
    this.providers = {};
    this.timeBuckets = [];
  }

  private provider(name: string): ProviderMetrics {
    return (this.providers[name] ??= { requests: 0, errors: 0, totalLatency: 0, cost: 0 });
  }

  private finish(ok: boolean, latencyMs: number): void {
    this.totalRequests++;
    if (!ok) this.totalErrors++;
    if (ok) {
      if (this.latencies.length >= MAX_LATENCIES) this.latencies.shift();
      this.latencies.push(latencyMs);
    }

    const bucketTs = Math.floor(this.now() / BUCKET_SIZE_MS) * BUCKET_SIZE_MS;
    const lastBucket = this.timeBuckets.at(-1);

    if (!lastBucket || lastBucket.ts !== bucketTs) {
      this.timeBuckets.push({
        ts: bucketTs,
        requests: 1,
        errors: ok ? 0 : 1,
        totalLatency: latencyMs,
      });
      if (this.timeBuckets.length > MAX_BUCKETS) this.timeBuckets.shift();
    } else {
      lastBucket.requests++;
      if (!ok) lastBucket.errors++;
      lastBucket.totalLatency += latencyMs;
    }
  }
}

export type GatewayStats = ReturnType<GatewayMetrics["getStats"]>;
