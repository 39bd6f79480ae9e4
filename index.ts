/**
 * index.ts
 * ────────
 * Entry point. Two modes:
 *
 *   node dist/index.js                                    → starts HTTP server
 *   node dist/index.js simulate [users] [concurrency] [policy]  → runs the load simulator
 *
 * The config file is GATEWAY_CONFIG, or gateway.config.json in the working
 * directory.
 */

import "dotenv/config";
import { createGateway } from "./src/bootstrap.js";
import { loadConfig, parseConfig } from "./src/config.js";
import { createServer } from "./src/server.js";
import { runSimulator } from "./src/Simulator.js";

const PORT = Number(process.env.PORT ?? 3000);
const CONFIG_PATH = process.env.GATEWAY_CONFIG ?? "gateway.config.json";

async function main() {
  const config = loadConfig(CONFIG_PATH);
  const mode = process.argv[2];

  if (mode === "simulate") {
    const policy = process.argv[5];
    const simConfig = policy ? parseConfig({ ...config, routing: { ...config.routing, policy } }) : config;
    const { gateway, metrics } = createGateway(simConfig, { log: false });
    const totalUsers = Number(process.argv[3] ?? 200);
    const concurrency = Number(process.argv[4] ?? 20);

    const result = await runSimulator(gateway, metrics, { totalUsers, concurrency });
    process.exit(result.failed > 0 ? 1 : 0);
  }

  const { gateway, metrics } = createGateway(config);
  gateway.cache.startSweeper();
  const app = createServer(gateway, metrics);

  app.listen(PORT, () => {
    console.log(`\n LLM gateway running on http://localhost:${PORT}`);
    console.log(`   providers: ${gateway.registry.list().map((p) => p.name).join(", ")}`);
    console.log(`   routing:   ${gateway.router.name}`);
    console.log(`   POST /v1/completions   → send a completion request`);
    console.log(`   GET  /stats            → metrics snapshot`);
    console.log(`   GET  /providers        → provider + breaker state\n`);
  });
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
