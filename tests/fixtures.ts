import type { CompletionRequest, ProviderDescriptor } from "../src/types.js";

export function makeRequest(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    id: "req-0001",
    messages: [{ role: "user", content: "hello there" }],
    capabilities: ["chat"],
    principal: "alice",
    maxTokens: 64,
    temperature: 0.2,
    deadline: Date.now() + 5_000,
    ...overrides,
  };
}

export function descriptor(name: string, costPer1kInput: number, costPer1kOutput = costPer1kInput): ProviderDescriptor {
  return {
    name,
    capabilities: ["chat"],
    costPer1kInput,
    costPer1kOutput,
    maxConcurrency: 1,
    inflight: 0,
    health: "CLOSED",
  };
}
