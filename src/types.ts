// Circuit breaker state
// CLOSED    - normal operation
// OPEN      - too many recent failures, provider is skipped
// HALF_OPEN - one trial call is allowed to test recovery

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type Clock = () => number;

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface TokenUsage {
    input: number;
    output: number;
    total: number;
}

/** What a caller submits. Missing fields are filled from config defaults. */
export interface CompletionInput {
    id?: string;
    messages: ChatMessage[];
    capabilities: string[];
    principal: string;
    maxTokens?: number;
    temperature?: number;
    preferredProvider?: string;
    deadline?: number; // absolute epoch ms
}

export interface CompletionRequest {
    readonly id: string;
    readonly messages: readonly ChatMessage[];
    readonly capabilities: readonly string[];
    readonly principal: string;
    readonly maxTokens: number;
    readonly temperature: number;
    readonly preferredProvider?: string;
    readonly deadline: number;
}

export interface CompletionResponse {
    requestId: string;
    provider: string;
    content: string;
    usage: TokenUsage;
    latencyMs: number;
    cached: boolean;
}

export interface ProviderDescriptor {
    readonly name: string;
    readonly capabilities: readonly string[];
    readonly costPer1kInput: number;
    readonly costPer1kOutput: number;
    readonly maxConcurrency: number;
    readonly inflight: number;
    readonly health: CircuitState;
}

export interface CacheEntry {
    fingerprint: string;
    response: CompletionResponse;
    createdAt: number;
    ttlMs: number;
    hitCount: number;
}

export interface BreakerSnapshot {
    provider: string;
    state: CircuitState;
    failureCount: number;
    openedAt: number;
}

export type BudgetPeriod = "hour" | "day" | "month" | "total";

export interface Budget {
    principal: string;
    period: BudgetPeriod;
    limit: number;
    spent: number;
    reserved: number;
    periodKey: string;
}

interface EventBase {
    requestId: string;
    timestamp: number;
}

export type GatewayEvent =
    | (EventBase & { type: "RequestStarted"; principal: string; capabilities: readonly string[] })
    | (EventBase & { type: "CacheHit"; fingerprint: string })
    | (EventBase & { type: "CacheMiss"; fingerprint: string })
    | (EventBase & { type: "ProviderCallSucceeded"; provider: string; model: string; latencyMs: number; usage: TokenUsage; cost: number })
    | (EventBase & { type: "ProviderCallFailed"; provider: string; code: string; message: string })
    | (EventBase & { type: "CircuitOpened"; provider: string; failureCount: number })
    | (EventBase & { type: "CircuitClosed"; provider: string })
    | (EventBase & { type: "BudgetExceeded"; principal: string; limit: number; spent: number; requested: number })
    | (EventBase & { type: "RequestCompleted"; provider: string; cached: boolean; latencyMs: number })
    | (EventBase & { type: "RequestFailed"; code: string; message: string });

export type GatewayEventType = GatewayEvent["type"];

export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };
