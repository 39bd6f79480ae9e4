/**
 * Load simulator: many virtual users sending completions through one gateway.
 *
 * 1. CONCURRENCY via a promise pool
 *    At most `concurrency` users run at once; as each finishes the next
 *    one starts.
 *
 * 2. REPEATED PROMPTS
 *    Users draw from a small shared prompt bank, so later requests hit the
 *    cache and the report shows the hit rate.
 *
 * 3. THINK TIME
 *    Each user pauses thinkTimeMs (randomised ±50%) between requests.
 */

import { isGatewayError } from "./errors.js";
import type { Gateway } from "./Gateway.js";
import type { GatewayMetrics } from "./metrics.js";
import { sleep } from "./time.js";

const PROMPTS = [
  "Summarise the water cycle in two sentences.",
  "List three uses of a hash map.",
  "Translate 'good morning' into French.",
  "What is the boiling point of water at sea level?",
  "Explain what a circuit breaker does in a distributed system.",
  "Give one example of an idempotent HTTP method.",
  "Describe exponential backoff in one paragraph.",
  "Name two differences between TCP and UDP.",
];

export interface SimulatorConfig {
  totalUsers: number;
  requestsPerUser: number;
  concurrency: number;
  thinkTimeMs: number;
  capability: string;
}

const DEFAULTS: SimulatorConfig = {
  totalUsers: 200,
  requestsPerUser: 3,
  concurrency: 20,
  thinkTimeMs: 50,
  capability: "chat",
};

function progressBar(done: number, total: number): string {
  const pct = Math.round((done / total) * 40);
  const bar = "█".repeat(pct) + "░".repeat(40 - pct);
  const perc = ((done / total) * 100).toFixed(1);
  return `[${bar}] ${perc}% (${done}/${total})`;
}

/** Runs at most `limit` tasks concurrently. */
export async function runPool(tasks: (() => Promise<void>)[], limit: number): Promise<void> {
  const queue = [...tasks];

  async function worker(): Promise<void> {
    for (let task = queue.shift(); task; task = queue.shift()) {
      await task();
    }
  }

  await Promise.all(Array.from({ length: Math.min(limit, queue.length) }, () => worker()));
}

export interface SimulationResult {
  succeeded: number;
  failed: number;
  failuresByCode: Record<string, number>;
}

export async function runSimulator(
  gateway: Gateway,
  metrics: GatewayMetrics,
  config: Partial<SimulatorConfig> = {},
): Promise<SimulationResult> {
  const cfg = { ...DEFAULTS, ...config };
  const total = cfg.totalUsers * cfg.requestsPerUser;
  const result: SimulationResult = { succeeded: 0, failed: 0, failuresByCode: {} };
  const startedAt = Date.now();

  console.log("\n─── Gateway simulator ───────────────────────────────");
  console.log(`  Users:        ${cfg.totalUsers}`);
  console.log(`  Requests/user:${cfg.requestsPerUser}`);
  console.log(`  Concurrency:  ${cfg.concurrency}`);
  console.log(`  Policy:       ${gateway.router.name}`);
  console.log("─────────────────────────────────────────────────────\n");

  const tasks = Array.from({ length: cfg.totalUsers }, (_, i) => async () => {
    const principal = `user-${String(i + 1).padStart(4, "0")}`;
    for (let q = 0; q < cfg.requestsPerUser; q++) {
      const prompt = PROMPTS[Math.floor(Math.random() * PROMPTS.length)];
      try {
        await gateway.complete({
          messages: [{ role: "user", content: prompt }],
          capabilities: [cfg.capability],
          principal,
        });
        result.succeeded++;
      } catch (err: unknown) {
        result.failed++;
        const code = isGatewayError(err) ? err.code : "UNKNOWN";
        result.failuresByCode[code] = (result.failuresByCode[code] ?? 0) + 1;
      }

      const done = result.succeeded + result.failed;
      if (done % 100 === 0) {
        const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
        process.stdout.write(`\r${progressBar(done, total)}  elapsed: ${elapsed}s`);
      }
      await sleep(cfg.thinkTimeMs * (0.5 + Math.random()));
    }
  });

  await runPool(tasks, cfg.concurrency);

  const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
  const stats = metrics.getStats();

  console.log("\n\n─── Simulation complete ─────────────────────────────");
  console.log(`  Duration:        ${elapsed}s`);
  console.log(`  Total Requests:  ${stats.totalRequests}`);
  console.log(`  Total Errors:    ${stats.totalErrors} (${stats.errorRate})`);
  console.log(`  Avg Latency:     ${stats.avgLatencyMs}ms`);
  console.log(`  P95 Latency:     ${stats.p95LatencyMs}ms`);
  console.log(`  Cache:           ${stats.cache.hits} hits / ${stats.cache.misses} misses (${stats.cache.hitRate})`);
  console.log(`  Circuit opens:   ${stats.circuitOpens}`);
  console.log("\n  Provider Distribution:");

  for (const [name, m] of Object.entries(stats.perProvider)) {
    const bar = "▓".repeat(Math.round((m.requests / Math.max(stats.totalRequests, 1)) * 30));
    console.log(`    ${name.padEnd(18)} ${bar} ${m.requests} calls  err:${m.errorRate}  avg:${m.avgLatencyMs}ms`);
  }

  for (const [code, count] of Object.entries(result.failuresByCode)) {
    console.log(`  ${code}: ${count}`);
  }
  console.log("─────────────────────────────────────────────────────\n");
  return result;
}
