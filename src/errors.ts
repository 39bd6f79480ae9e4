/**
 * Error taxonomy returned by Gateway.complete().
 *
 * Callers branch on `code`; the HTTP layer maps `status` straight onto the
 * response. Adapter-specific failures never leave the gateway: they are
 * classified into ProviderTransientError / ProviderPermanentError first.
 */

export type GatewayErrorCode =
  | "INVALID_REQUEST"
  | "CAPACITY_EXCEEDED"
  | "CIRCUIT_OPEN"
  | "PROVIDER_TRANSIENT"
  | "PROVIDER_PERMANENT"
  | "BUDGET_EXCEEDED"
  | "DEADLINE_EXCEEDED"
  | "ALL_PROVIDERS_FAILED";

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

export class InvalidRequestError extends GatewayError {
  readonly code = "INVALID_REQUEST";
  readonly status = 400;

  constructor(readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`);
  }

  override details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export class CapacityExceededError extends GatewayError {
  readonly code = "CAPACITY_EXCEEDED";
  readonly status = 503;

  constructor(readonly provider: string, readonly maxConcurrency: number) {
    super(`Provider ${provider} is at its concurrency limit (${maxConcurrency})`);
  }
}

export class CircuitOpenError extends GatewayError {
  readonly code = "CIRCUIT_OPEN";
  readonly status = 503;

  constructor(readonly provider: string) {
    super(`Circuit for ${provider} is open`);
  }
}

export class ProviderTransientError extends GatewayError {
  readonly code = "PROVIDER_TRANSIENT";
  readonly status = 502;
  readonly unknown: boolean;
  readonly upstreamStatus?: number;

  constructor(
    readonly provider: string,
    message: string,
    options: { cause?: unknown; unknown?: boolean; upstreamStatus?: number } = {},
  ) {
    super(`${provider}: ${message}`, { cause: options.cause });
    this.unknown = options.unknown ?? false;
    this.upstreamStatus = options.upstreamStatus;
  }

  override details(): Record<string, unknown> {
    return { provider: this.provider, unknown: this.unknown, upstreamStatus: this.upstreamStatus };
  }
}

export class ProviderPermanentError extends GatewayError {
  readonly code = "PROVIDER_PERMANENT";
  readonly status = 502;
  readonly upstreamStatus?: number;

  constructor(
    readonly provider: string,
    message: string,
    options: { cause?: unknown; upstreamStatus?: number } = {},
  ) {
    super(`${provider}: ${message}`, { cause: options.cause });
    this.upstreamStatus = options.upstreamStatus;
  }

  override details(): Record<string, unknown> {
    return { provider: this.provider, upstreamStatus: this.upstreamStatus };
  }
}

export class BudgetExceededError extends GatewayError {
  readonly code = "BUDGET_EXCEEDED";
  readonly status = 402;

  constructor(
    readonly principal: string,
    readonly limit: number,
    readonly spent: number,
    readonly requested: number,
  ) {
    super(
      `Budget exceeded for ${principal}: spent ${spent.toFixed(4)} of ${limit.toFixed(4)}, requested ${requested.toFixed(4)}`,
    );
  }

  override details(): Record<string, unknown> {
    return { principal: this.principal, limit: this.limit, spent: this.spent, requested: this.requested };
  }
}

export class DeadlineExceededError extends GatewayError {
  readonly code = "DEADLINE_EXCEEDED";
  readonly status = 504;

  constructor(readonly deadline: number) {
    super(`Deadline exceeded at ${new Date(deadline).toISOString()}`);
  }
}

export interface ProviderFailure {
  provider: string;
  error: GatewayError;
}

export class AllProvidersFailedError extends GatewayError {
  readonly code = "ALL_PROVIDERS_FAILED";
  readonly status = 502;

  constructor(readonly failures: ProviderFailure[]) {
    super(
      failures.length === 0
        ? "No capable provider available"
        : `All providers failed: ${failures.map((f) => `${f.provider} (${f.error.code})`).join(", ")}`,
    );
  }

  override details(): Record<string, unknown> {
    return {
      failures: this.failures.map((f) => ({ provider: f.provider, code: f.error.code, message: f.error.message })),
    };
  }
}

// ─── Adapter-side errors ──────────────────────────────────────────────────────

export type ProviderErrorKind = "transient" | "permanent" | "unknown";

/** Thrown by adapters; classified into the taxonomy by the resilience layer. */
export class ProviderError extends Error {
  constructor(
    readonly kind: ProviderErrorKind,
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}
