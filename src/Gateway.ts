/**
 * Gateway.ts
 * ──────────
 * Ties all the pieces together for a single request.
 *
 * Flow:
 *   1. Validate the input (InvalidRequestError before anything else runs)
 *   2. Fingerprint and check the cache; a hit is returned free of charge
 *   3. Ask the registry for capable, non-OPEN providers; let the router order them
 *   4. For each candidate: hold budget → take a concurrency slot → resilient call
 *      success → commit actual cost, cache, return
 *      failure → roll back the hold, try the next candidate
 *   5. Exhausted → AllProvidersFailedError with every candidate's last error
 *
 * Request-global failures (deadline, a principal with no budget left) stop
 * the walk immediately; everything else is local to one candidate. A caller
 * that aborts its signal is treated as a passed deadline.
 */

import { v4 as uuid } from "uuid";
import { z } from "zod";
import { fingerprint, type CacheLayer } from "./cache.js";
import {
  AllProvidersFailedError,
  BudgetExceededError,
  CapacityExceededError,
  DeadlineExceededError,
  GatewayError,
  InvalidRequestError,
  ProviderTransientError,
  isGatewayError,
  type ProviderFailure,
} from "./errors.js";
import { actualCost, type CostLedger, type Reservation } from "./ledger.js";
import type { BreakerTransition } from "./breaker.js";
import type { EventBus } from "./events.js";
import type { ProviderRegistry, ProviderSlot } from "./registry.js";
import type { CallResult, ResilienceLayer } from "./resilience.js";
import type { LatencyTracker, RoutingStrategy } from "./router.js";
import type {
  Clock,
  CompletionRequest,
  CompletionResponse,
  GatewayEvent,
  Outcome,
  ProviderDescriptor,
} from "./types.js";

export interface GatewayDefaults {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface CompleteOptions {
  /** Aborting ends the request as if its deadline had passed. */
  signal?: AbortSignal;
}

export interface GatewayDeps {
  registry: ProviderRegistry;
  resilience: ResilienceLayer;
  cache: CacheLayer;
  ledger: CostLedger;
  router: RoutingStrategy;
  bus: EventBus;
  latency: LatencyTracker;
  defaults?: Partial<GatewayDefaults>;
  now?: Clock;
}

const DEFAULTS: GatewayDefaults = {
  maxTokens: 1024,
  temperature: 0.7,
  timeoutMs: 30_000,
};

const MessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const CompletionInputSchema = z.object({
  id: z.string().min(1).optional(),
  messages: z
    .array(MessageSchema)
    .min(1)
    .refine((msgs) => msgs.some((m) => m.content.trim().length > 0), "messages must contain some text"),
  capabilities: z.array(z.string().min(1)).min(1),
  principal: z.string().min(1),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  preferredProvider: z.string().min(1).optional(),
  deadline: z.number().positive().optional(),
});

export class Gateway {
  readonly registry: ProviderRegistry;
  readonly resilience: ResilienceLayer;
  readonly cache: CacheLayer;
  readonly ledger: CostLedger;
  readonly router: RoutingStrategy;
  readonly bus: EventBus;
  readonly latency: LatencyTracker;
  private readonly defaults: GatewayDefaults;
  private readonly now: Clock;

  constructor(deps: GatewayDeps) {
    this.registry = deps.registry;
    this.resilience = deps.resilience;
    this.cache = deps.cache;
    this.ledger = deps.ledger;
    this.router = deps.router;
    this.bus = deps.bus;
    this.latency = deps.latency;
    this.defaults = { ...DEFAULTS, ...deps.defaults };
    this.now = deps.now ?? Date.now;
    this.registry.useHealthSource(this.resilience);
  }

  /** Accepts a CompletionInput-shaped value; anything else is an InvalidRequestError. */
  async complete(input: unknown, options: CompleteOptions = {}): Promise<CompletionResponse> {
    const request = this.validate(input);
    const startedAt = this.now();
    this.emit({
      timestamp: this.now(),
      type: "RequestStarted",
      requestId: request.id,
      principal: request.principal,
      capabilities: request.capabilities,
    });

    try {
      const response = await this.run(request, startedAt, options.signal);
      this.emit({
        timestamp: this.now(),
        type: "RequestCompleted",
        requestId: request.id,
        provider: response.provider,
        cached: response.cached,
        latencyMs: response.latencyMs,
      });
      return response;
    } catch (err: unknown) {
      const error = isGatewayError(err) ? err : wrapUnexpected(err);
      this.emit({
        timestamp: this.now(),
        type: "RequestFailed",
        requestId: request.id,
        code: error.code,
        message: error.message,
      });
      throw error;
    }
  }

  validate(input: unknown): CompletionRequest {
    const parsed = CompletionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)),
      );
    }
    const data = parsed.data;
    return Object.freeze({
      id: data.id ?? uuid(),
      messages: Object.freeze(data.messages.map((m) => Object.freeze({ ...m }))),
      capabilities: Object.freeze([...data.capabilities]),
      principal: data.principal,
      maxTokens: data.maxTokens ?? this.defaults.maxTokens,
      temperature: data.temperature ?? this.defaults.temperature,
      preferredProvider: data.preferredProvider,
      deadline: data.deadline ?? this.now() + this.defaults.timeoutMs,
    });
  }

  private async run(request: CompletionRequest, startedAt: number, signal?: AbortSignal): Promise<CompletionResponse> {
    const fp = fingerprint(request);
    const lookup = this.cache.get(fp);
    if (lookup.hit && lookup.entry) {
      this.emit({ timestamp: this.now(), type: "CacheHit", requestId: request.id, fingerprint: fp });
      const cached = lookup.entry.response;
      return {
        ...cached,
        usage: { ...cached.usage },
        requestId: request.id,
        latencyMs: this.now() - startedAt,
        cached: true,
      };
    }
    this.emit({ timestamp: this.now(), type: "CacheMiss", requestId: request.id, fingerprint: fp });

    const candidates = this.router.select(request, this.registry.listCapable(request.capabilities));
    if (candidates.length === 0) throw new AllProvidersFailedError([]);

    const failures: ProviderFailure[] = [];
    for (const provider of candidates) {
      if (this.now() >= request.deadline || signal?.aborted) {
        throw new DeadlineExceededError(request.deadline);
      }

      let reservation: Reservation;
      try {
        reservation = this.ledger.reserve(request.principal, this.ledger.estimateCost(request, provider));
      } catch (err: unknown) {
        if (!(err instanceof BudgetExceededError)) throw err;
        this.emit({
          timestamp: this.now(),
          type: "BudgetExceeded",
          requestId: request.id,
          principal: err.principal,
          limit: err.limit,
          spent: err.spent,
          requested: err.requested,
        });
        // nothing left at all: no cheaper candidate can help
        if (this.ledger.remaining(request.principal) <= 0) throw err;
        failures.push({ provider: provider.name, error: err });
        continue;
      }

      const outcome = await this.attempt(provider, request, reservation, signal);
      if (outcome.ok) {
        const { result, latencyMs } = outcome.value;
        const cost = actualCost(result.usage, provider);
        this.ledger.commit(reservation, cost);
        this.latency.record(provider.name, latencyMs);

        const response: CompletionResponse = {
          requestId: request.id,
          provider: provider.name,
          content: result.content,
          usage: { ...result.usage },
          latencyMs: this.now() - startedAt,
          cached: false,
        };
        this.cache.put(fp, response);
        this.emit({
          timestamp: this.now(),
          type: "ProviderCallSucceeded",
          requestId: request.id,
          provider: provider.name,
          model: result.model ?? provider.name,
          latencyMs,
          usage: { ...result.usage },
          cost,
        });
        return response;
      }

      this.ledger.rollback(reservation);
      const error = outcome.error;
      this.emit({
        timestamp: this.now(),
        type: "ProviderCallFailed",
        requestId: request.id,
        provider: provider.name,
        code: error.code,
        message: error.message,
      });
      if (error instanceof DeadlineExceededError) throw error;
      failures.push({ provider: provider.name, error });
    }

    if (failures.every((f) => f.error instanceof BudgetExceededError)) {
      const first = failures[0];
      if (first) throw first.error;
    }
    throw new AllProvidersFailedError(failures);
  }

  private async attempt(
    provider: ProviderDescriptor,
    request: CompletionRequest,
    reservation: Reservation,
    signal?: AbortSignal,
  ): Promise<Outcome<CallResult, GatewayError>> {
    let slot: ProviderSlot;
    try {
      slot = this.registry.reserve(provider.name);
    } catch (err: unknown) {
      if (err instanceof CapacityExceededError) return { ok: false, error: err };
      this.ledger.rollback(reservation);
      throw err;
    }

    try {
      return await this.resilience.execute(provider.name, this.registry.adapterFor(provider.name), request, {
        requestId: request.id,
        deadline: request.deadline,
        signal,
        onTransition: (t) => this.onTransition(request.id, t),
      });
    } catch (err: unknown) {
      this.ledger.rollback(reservation);
      throw err;
    } finally {
      slot.release();
    }
  }

  private onTransition(requestId: string, t: BreakerTransition): void {
    if (t.to === "OPEN") {
      this.emit({
        timestamp: this.now(),
        type: "CircuitOpened",
        requestId,
        provider: t.provider,
        failureCount: t.failureCount,
      });
    } else if (t.to === "CLOSED") {
      this.emit({ timestamp: this.now(), type: "CircuitClosed", requestId, provider: t.provider });
    }
  }

  private emit(event: GatewayEvent): void {
    this.bus.publish(event);
  }
}

function wrapUnexpected(err: unknown): GatewayError {
  const msg = err instanceof Error ? err.message : String(err);
  return new AllProvidersFailedError([
    { provider: "gateway", error: new ProviderTransientError("gateway", msg, { cause: err, unknown: true }) },
  ]);
}
