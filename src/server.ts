/**
 * Thin HTTP layer over the gateway.
 * The server only parses requests and formats responses; every decision
 * is made by Gateway.complete().
 *
 * Endpoints:
 *   POST   /v1/completions        → single completion
 *   GET    /stats                 → metrics snapshot
 *   POST   /stats/reset           → clear metrics
 *   GET    /providers             → descriptors + breaker state
 *   GET    /budgets/:principal    → budget snapshot
 *   DELETE /cache                 → drop every cached response
 *   DELETE /cache/:fingerprint    → drop one cached response
 *
 * A client that disconnects before its completion is sent aborts the
 * in-flight provider call.
 */

import express, { type Response } from "express";
import { isGatewayError } from "./errors.js";
import type { Gateway } from "./Gateway.js";
import type { GatewayMetrics } from "./metrics.js";

export function sendError(res: Response, err: unknown): void {
  if (isGatewayError(err)) {
    res.status(err.status).json({ error: { code: err.code, message: err.message, details: err.details() } });
    return;
  }
  console.error("[Server] unexpected error:", err);
  res.status(500).json({ error: { code: "INTERNAL", message: "Internal server error" } });
}

interface BodyParserError {
  status: number;
  type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string"
  );
}

function bodyErrorMessage(type: string): string {
  switch (type) {
    case "entity.parse.failed":
      return "Malformed JSON body";
    case "entity.too.large":
      return "Request body too large";
    default:
      return "Unreadable request body";
  }
}

export function createServer(gateway: Gateway, metrics: GatewayMetrics) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.post("/v1/completions", async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const response = await gateway.complete(req.body, { signal: controller.signal });
      res.json(response);
    } catch (err: unknown) {
      // client is gone; the failure was already published on the bus
      if (controller.signal.aborted) return;
      sendError(res, err);
    }
  });

  app.get("/stats", (_req, res) => {
    res.json(metrics.getStats());
  });

  app.post("/stats/reset", (_req, res) => {
    metrics.reset();
    res.json({ ok: true, message: "Metrics reset" });
  });

  app.get("/providers", (_req, res) => {
    const breakers = new Map(gateway.resilience.snapshots().map((b) => [b.provider, b]));
    res.json(
      gateway.registry.list().map((p) => ({
        ...p,
        breaker: breakers.get(p.name) ?? { provider: p.name, state: "CLOSED", failureCount: 0, openedAt: 0 },
      })),
    );
  });

  app.get("/budgets/:principal", (req, res) => {
    const budget = gateway.ledger.snapshot(req.params.principal);
    res.json({ ...budget, limit: Number.isFinite(budget.limit) ? budget.limit : null });
  });

  app.delete("/cache", (_req, res) => {
    gateway.cache.clear();
    res.json({ ok: true });
  });

  app.delete("/cache/:fingerprint", (req, res) => {
    const removed = gateway.cache.invalidate(req.params.fingerprint);
    res.status(removed ? 200 : 404).json({ ok: removed });
  });

  // body-parser failures land here
  app.use((err: unknown, _req: express.Request, res: Response, _next: express.NextFunction) => {
    if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: { code: "INVALID_REQUEST", message: bodyErrorMessage(err.type) } });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "INVALID_REQUEST", message: "Malformed JSON body" } });
      return;
    }
    sendError(res, err);
  });

  return app;
}
