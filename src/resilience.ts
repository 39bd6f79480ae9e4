/**
 * Wraps every provider call with the provider's circuit breaker and a
 * bounded retry loop.
 *
 * Retry behaviour:
 *   transient  → retried up to maxRetries times, exponential backoff with jitter
 *   unknown    → retried once, then surfaced as transient
 *   permanent  → never retried
 *   any failure that opens the circuit ends the loop at once
 *
 * Every attempt and every backoff sleep is bounded by the request deadline.
 * A call still running at the deadline is aborted through its AbortSignal and
 * its late result is ignored.
 *
 * Results come back as Outcome values; nothing here throws for a provider
 * failure.
 */

import { CircuitBreaker, type Admission, type BreakerSettings, type TransitionListener } from "./breaker.js";
import {
  CircuitOpenError,
  DeadlineExceededError,
  GatewayError,
  ProviderError,
  ProviderPermanentError,
  ProviderTransientError,
} from "./errors.js";
import { sleep } from "./time.js";
import type { ProviderAdapter, ProviderResult } from "./dispatcher.js";
import type { HealthSource } from "./registry.js";
import type { BreakerSnapshot, CircuitState, Clock, CompletionRequest, Outcome } from "./types.js";

export interface RetrySettings {
  maxRetries: number;
  backoffBaseMs: number;
  maxBackoffMs?: number;
}

export type ResilienceSettings = BreakerSettings & RetrySettings;

export interface ExecuteContext {
  requestId: string;
  deadline: number;
  /** Caller-side cancellation; aborting ends the call like a passed deadline. */
  signal?: AbortSignal;
  onTransition?: TransitionListener;
}

export interface CallResult {
  result: ProviderResult;
  latencyMs: number;
  attempts: number;
}

const DEFAULT_MAX_BACKOFF_MS = 10_000;

export class ResilienceLayer implements HealthSource {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly settings: ResilienceSettings,
    private readonly now: Clock = Date.now,
    private readonly random: () => number = Math.random,
  ) {}

  breaker(provider: string): CircuitBreaker {
    let breaker = this.breakers.get(provider);
    if (!breaker) {
      breaker = new CircuitBreaker(provider, this.settings, this.now);
      this.breakers.set(provider, breaker);
    }
    return breaker;
  }

  stateOf(provider: string): CircuitState {
    return this.breakers.get(provider)?.peekState() ?? "CLOSED";
  }

  snapshots(): BreakerSnapshot[] {
    return [...this.breakers.values()].map((b) => b.snapshot());
  }

  /** Delay before retry number `attempt + 1`. */
  backoff(attempt: number): number {
    const base = this.settings.backoffBaseMs * 2 ** attempt;
    const jittered = base * (0.5 + this.random() * 0.5);
    return Math.min(this.settings.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS, jittered);
  }

  async execute(
    provider: string,
    adapter: ProviderAdapter,
    request: CompletionRequest,
    ctx: ExecuteContext,
  ): Promise<Outcome<CallResult, GatewayError>> {
    const breaker = this.breaker(provider);
    let lastError: GatewayError | undefined;
    let unknownRetried = false;

    for (let attempt = 0; ; attempt++) {
      if (this.now() >= ctx.deadline || ctx.signal?.aborted) {
        return { ok: false, error: new DeadlineExceededError(ctx.deadline) };
      }

      let admission: Admission;
      try {
        admission = breaker.admit(ctx.onTransition);
      } catch (err: unknown) {
        if (err instanceof CircuitOpenError) return { ok: false, error: lastError ?? err };
        throw err;
      }

      const startedAt = this.now();
      const outcome = await this.callOnce(provider, adapter, request, ctx);
      if (outcome.ok) {
        breaker.onSuccess(admission, ctx.onTransition);
        return {
          ok: true,
          value: { result: outcome.value, latencyMs: this.now() - startedAt, attempts: attempt + 1 },
        };
      }

      const error = outcome.error;
      if (error instanceof DeadlineExceededError) {
        breaker.abandon(admission);
        return { ok: false, error };
      }

      const permanent = error instanceof ProviderPermanentError;
      breaker.onFailure(admission, !permanent, ctx.onTransition);
      lastError = error;
      if (permanent) return { ok: false, error };
      // no retries against an open circuit
      if (breaker.peekState() === "OPEN") return { ok: false, error };

      if (error instanceof ProviderTransientError && error.unknown) {
        if (unknownRetried) return { ok: false, error };
        unknownRetried = true;
      }
      if (attempt >= this.settings.maxRetries) return { ok: false, error };

      const delayMs = this.backoff(attempt);
      try {
        await sleep(Math.min(delayMs, Math.max(0, ctx.deadline - this.now())), ctx.signal);
      } catch {
        return { ok: false, error: new DeadlineExceededError(ctx.deadline) };
      }
    }
  }

  private async callOnce(
    provider: string,
    adapter: ProviderAdapter,
    request: CompletionRequest,
    ctx: ExecuteContext,
  ): Promise<Outcome<ProviderResult, GatewayError>> {
    const controller = new AbortController();
    const expiredError = new DeadlineExceededError(ctx.deadline);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort(expiredError);
        reject(expiredError);
      }, Math.max(0, ctx.deadline - this.now()));
    });
    const onCallerAbort = () => controller.abort(expiredError);
    ctx.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const result = await Promise.race([
        adapter.generate(request, { signal: controller.signal, deadline: ctx.deadline }),
        expired,
      ]);
      return { ok: true, value: result };
    } catch (err: unknown) {
      return { ok: false, error: classify(provider, err, controller.signal) };
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

export function classify(provider: string, err: unknown, signal?: AbortSignal): GatewayError {
  if (err instanceof DeadlineExceededError) return err;
  if (signal?.aborted && signal.reason instanceof DeadlineExceededError) return signal.reason;

  if (err instanceof ProviderError) {
    switch (err.kind) {
      case "permanent":
        return new ProviderPermanentError(provider, err.message, { cause: err, upstreamStatus: err.upstreamStatus });
      case "transient":
        return new ProviderTransientError(provider, err.message, { cause: err, upstreamStatus: err.upstreamStatus });
      case "unknown":
        return new ProviderTransientError(provider, err.message, {
          cause: err,
          unknown: true,
          upstreamStatus: err.upstreamStatus,
        });
    }
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new ProviderTransientError(provider, msg, { cause: err, unknown: true });
}
