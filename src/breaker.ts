/**
 * Per-provider circuit breaker.
 *
 *   CLOSED    → OPEN       failureThreshold transient failures inside windowMs
 *   OPEN      → HALF_OPEN  cooldownMs after openedAt, on the next admit()
 *   HALF_OPEN → CLOSED     the single trial call succeeds
 *   HALF_OPEN → OPEN       the trial call fails (openedAt is reset)
 *
 * admit() and the outcome callbacks are synchronous, so every transition
 * completes without yielding to the event loop. While the trial is in
 * flight further admit() calls are rejected.
 */

import { CircuitOpenError } from "./errors.js";
import type { BreakerSnapshot, CircuitState, Clock } from "./types.js";

export interface BreakerSettings {
  failureThreshold: number;
  cooldownMs: number;
  /** Sliding window for counting failures while CLOSED. */
  windowMs: number;
}

export type BreakerTransition = {
  provider: string;
  from: CircuitState;
  to: CircuitState;
  failureCount: number;
};

export type TransitionListener = (transition: BreakerTransition) => void;

/** Proof of admission; pass it back to exactly one outcome call. */
export interface Admission {
  readonly trial: boolean;
}

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures: number[] = [];
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    readonly provider: string,
    private readonly settings: BreakerSettings,
    private readonly now: Clock = Date.now,
  ) {}

  /** Throws CircuitOpenError when no call may pass right now. */
  admit(notify?: TransitionListener): Admission {
    if (this.state === "OPEN") {
      if (this.now() - this.openedAt < this.settings.cooldownMs) {
        throw new CircuitOpenError(this.provider);
      }
      this.transition("HALF_OPEN", notify);
    }

    if (this.state === "HALF_OPEN") {
      if (this.trialInFlight) throw new CircuitOpenError(this.provider);
      this.trialInFlight = true;
      return { trial: true };
    }

    return { trial: false };
  }

  onSuccess(admission: Admission, notify?: TransitionListener): void {
    if (admission.trial) {
      this.trialInFlight = false;
      this.failures = [];
      this.transition("CLOSED", notify);
      return;
    }
    this.failures = [];
  }

  /**
   * `counts` is false for permanent failures: they say nothing about
   * provider health while CLOSED, but still fail a trial.
   */
  onFailure(admission: Admission, counts = true, notify?: TransitionListener): void {
    const now = this.now();
    if (admission.trial) {
      this.trialInFlight = false;
      this.openedAt = now;
      this.failures.push(now);
      this.transition("OPEN", notify);
      return;
    }
    if (!counts || this.state !== "CLOSED") return;

    this.failures.push(now);
    this.failures = this.failures.filter((ts) => now - ts < this.settings.windowMs);
    if (this.failures.length >= this.settings.failureThreshold) {
      this.openedAt = now;
      this.transition("OPEN", notify);
    }
  }

  /** Releases an admission whose call was abandoned without a verdict. */
  abandon(admission: Admission): void {
    if (admission.trial) this.trialInFlight = false;
  }

  /** Current state as routing would see it; never mutates. */
  peekState(): CircuitState {
    if (this.state === "OPEN" && this.now() - this.openedAt >= this.settings.cooldownMs) {
      return "HALF_OPEN";
    }
    return this.state;
  }

  snapshot(): BreakerSnapshot {
    return {
      provider: this.provider,
      state: this.peekState(),
      failureCount: this.failures.length,
      openedAt: this.openedAt,
    };
  }

  private transition(to: CircuitState, notify?: TransitionListener): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;

    if (to === "OPEN") {
      console.warn(`[Breaker] ${this.provider} opened after ${this.failures.length} failures`);
    } else if (to === "CLOSED") {
      console.log(`[Breaker] ${this.provider} recovered → closed`);
    }
    notify?.({ provider: this.provider, from, to, failureCount: this.failures.length });
  }
}
