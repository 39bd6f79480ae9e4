/**
 * Per-principal spend tracking and budget enforcement.
 *
 * reserve() is check-and-hold in one synchronous step: two concurrent
 * requests can never both pass a check that only one of them fits.
 * Outstanding reservations count against the limit until committed or
 * rolled back.
 *
 * Periods roll over lazily: the first access after a UTC hour/day/month
 * boundary resets `spent`.
 *
 * Only reserve() and setSpent() create an entry. Reads compute a view
 * without storing it, and an unlimited principal with nothing spent or
 * held is dropped once its last reservation settles.
 */

import { estimateInputTokens } from "./dispatcher.js";
import { BudgetExceededError } from "./errors.js";
import type { Budget, BudgetPeriod, Clock, CompletionRequest, ProviderDescriptor, TokenUsage } from "./types.js";

export interface BudgetDefinition {
  principal: string;
  limit: number;
  period: BudgetPeriod;
}

export interface Reservation {
  readonly principal: string;
  readonly amount: number;
}

type Pricing = Pick<ProviderDescriptor, "costPer1kInput" | "costPer1kOutput">;

/** Upper-bound estimate: the output side assumes the full maxTokens. */
export function estimateCost(request: CompletionRequest, provider: Pricing): number {
  const input = estimateInputTokens(request.messages);
  return (input / 1000) * provider.costPer1kInput + (request.maxTokens / 1000) * provider.costPer1kOutput;
}

export function actualCost(usage: TokenUsage, provider: Pricing): number {
  return (usage.input / 1000) * provider.costPer1kInput + (usage.output / 1000) * provider.costPer1kOutput;
}

export function periodKey(period: BudgetPeriod, at: number): string {
  const iso = new Date(at).toISOString();
  switch (period) {
    case "hour":
      return iso.slice(0, 13);
    case "day":
      return iso.slice(0, 10);
    case "month":
      return iso.slice(0, 7);
    case "total":
      return "total";
  }
}

const UNLIMITED: Omit<BudgetDefinition, "principal"> = { limit: Number.POSITIVE_INFINITY, period: "total" };

export class CostLedger {
  private readonly budgets = new Map<string, Budget>();
  private readonly definitions = new Map<string, BudgetDefinition>();
  private readonly settled = new WeakSet<Reservation>();

  constructor(
    definitions: BudgetDefinition[] = [],
    private readonly defaultBudget?: Omit<BudgetDefinition, "principal">,
    private readonly now: Clock = Date.now,
  ) {
    for (const def of definitions) {
      if (!(def.limit >= 0)) throw new Error(`Budget for ${def.principal}: limit must be >= 0`);
      this.definitions.set(def.principal, def);
    }
  }

  estimateCost(request: CompletionRequest, provider: Pricing): number {
    return estimateCost(request, provider);
  }

  /** Holds `cost` against the principal's budget or throws without mutating. */
  reserve(principal: string, cost: number): Reservation {
    const budget = this.budgetFor(principal);
    if (budget.spent + budget.reserved + cost > budget.limit) {
      throw new BudgetExceededError(principal, budget.limit, budget.spent + budget.reserved, cost);
    }
    budget.reserved += cost;
    return { principal, amount: cost };
  }

  commit(reservation: Reservation, actual: number): void {
    if (this.settled.has(reservation)) return;
    this.settled.add(reservation);
    const budget = this.budgetFor(reservation.principal);
    budget.reserved = Math.max(0, budget.reserved - reservation.amount);
    budget.spent += actual;
    if (budget.spent > budget.limit) {
      console.warn(
        `[Ledger] ${reservation.principal} charged ${actual.toFixed(4)} over its estimate; spent ${budget.spent.toFixed(4)} of ${budget.limit}`,
      );
    }
    this.dropIfIdle(budget);
  }

  rollback(reservation: Reservation): void {
    if (this.settled.has(reservation)) return;
    this.settled.add(reservation);
    const budget = this.budgetFor(reservation.principal);
    budget.reserved = Math.max(0, budget.reserved - reservation.amount);
    this.dropIfIdle(budget);
  }

  /** Budget left after spend and outstanding reservations. */
  remaining(principal: string): number {
    const budget = this.view(principal);
    return budget.limit - budget.spent - budget.reserved;
  }

  snapshot(principal: string): Budget {
    return { ...this.view(principal) };
  }

  /** Number of principals with a stored entry. */
  get size(): number {
    return this.budgets.size;
  }

  /** Test and bootstrap hook: seeds spend already incurred this period. */
  setSpent(principal: string, spent: number): void {
    this.budgetFor(principal).spent = spent;
  }

  private budgetFor(principal: string): Budget {
    let budget = this.budgets.get(principal);
    if (!budget) {
      budget = this.fresh(principal);
      this.budgets.set(principal, budget);
    }
    return this.rollOver(budget);
  }

  private view(principal: string): Budget {
    const budget = this.budgets.get(principal);
    return budget ? this.rollOver(budget) : this.fresh(principal);
  }

  private fresh(principal: string): Budget {
    const def = this.definitions.get(principal) ?? { principal, ...(this.defaultBudget ?? UNLIMITED) };
    return {
      principal,
      period: def.period,
      limit: def.limit,
      spent: 0,
      reserved: 0,
      periodKey: periodKey(def.period, this.now()),
    };
  }

  private rollOver(budget: Budget): Budget {
    const key = periodKey(budget.period, this.now());
    if (budget.periodKey !== key) {
      budget.spent = 0;
      budget.periodKey = key;
    }
    return budget;
  }

  private dropIfIdle(budget: Budget): void {
    if (!Number.isFinite(budget.limit) && budget.spent === 0 && budget.reserved === 0) {
      this.budgets.delete(budget.principal);
    }
  }
}
