/**
 * Provider adapters: the only place that knows how an upstream is called.
 *
 * Router decides WHICH provider to try, the resilience layer decides HOW
 * OFTEN; an adapter only translates a canonical request into one upstream
 * call and the upstream answer (or failure) back.
 *
 * Error classification (ProviderError.kind):
 *   - network error, 408, 429, 5xx   → transient (retryable)
 *   - 400, 401, 403, 404, 422        → permanent
 *   - unparseable body, other status → unknown
 *
 * Token usage is always reported. When the upstream omits a count, or
 * reports one that is not a non-negative integer, we fall back to
 * estimateTokens() so the ledger has a number to charge.
 */

import { z } from "zod";
import { ProviderError } from "./errors.js";
import { sleep } from "./time.js";
import type { ChatMessage, CompletionRequest, TokenUsage } from "./types.js";

export interface CallContext {
  signal: AbortSignal;
  deadline: number;
}

export interface ProviderResult {
  content: string;
  usage: TokenUsage;
  model?: string;
}

export interface ProviderAdapter {
  generate(request: CompletionRequest, ctx: CallContext): Promise<ProviderResult>;
}

const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  if (text.length === 0) return 0;
  return Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN));
}

export function estimateInputTokens(messages: readonly ChatMessage[]): number {
  return messages.reduce((sum, m) => sum + estimateTokens(m.content), 0);
}

/** Fills whatever part of usage the upstream did not report. */
export function completeUsage(
  request: CompletionRequest,
  content: string,
  reported: Partial<TokenUsage> = {},
): TokenUsage {
  const input = reported.input ?? estimateInputTokens(request.messages);
  const output = reported.output ?? estimateTokens(content);
  return { input, output, total: input + output };
}

export function classifyStatus(status: number): ProviderError["kind"] {
  if (status === 408 || status === 429 || status >= 500) return "transient";
  if (status === 400 || status === 401 || status === 403 || status === 404 || status === 422) {
    return "permanent";
  }
  return "unknown";
}

// ─── OpenAI-compatible HTTP adapter ───────────────────────────────────────────

export interface OpenAICompatibleOptions {
  baseUrl: string;
  model: string;
  apiKey: string;
  topP?: number;
  fetchImpl?: typeof fetch;
}

const TokenCount = z.number().int().nonnegative();

const ChatCompletionBody = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .optional(),
  usage: z
    .object({ prompt_tokens: z.unknown().optional(), completion_tokens: z.unknown().optional() })
    .nullish(),
});

function tokenCount(value: unknown): number | undefined {
  const parsed = TokenCount.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: OpenAICompatibleOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generate(request: CompletionRequest, ctx: CallContext): Promise<ProviderResult> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const body = JSON.stringify({
      model: this.opts.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      top_p: this.opts.topP,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.opts.apiKey}`,
        },
        body,
        signal: ctx.signal,
      });
    } catch (err: unknown) {
      if (ctx.signal.aborted) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new ProviderError("transient", `Network error: ${msg}`, undefined, { cause: err });
    }

    if (!response.ok) {
      const errBody = await response.text().catch(() => "(unreadable)");
      throw new ProviderError(
        classifyStatus(response.status),
        `HTTP ${response.status}: ${errBody.slice(0, 200)}`,
        response.status,
      );
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err: unknown) {
      throw new ProviderError("unknown", "Unparseable response body", response.status, { cause: err });
    }

    const parsed = ChatCompletionBody.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError("unknown", "Unexpected response shape", response.status, { cause: parsed.error });
    }
    const data = parsed.data;

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ProviderError("permanent", "Response has no message content", response.status);
    }

    return {
      content,
      usage: completeUsage(request, content, {
        input: tokenCount(data.usage?.prompt_tokens),
        output: tokenCount(data.usage?.completion_tokens),
      }),
      model: data.model ?? this.opts.model,
    };
  }
}

// ─── Mock adapter ─────────────────────────────────────────────────────────────

export interface MockAdapterOptions {
  /** Fixed reply; defaults to a deterministic echo of the last message. */
  reply?: string;
  latencyMs?: number;
  /** Reported usage; estimated from text when omitted. */
  usage?: { input: number; output: number };
  /** Failure kinds consumed one per call before calls start succeeding. */
  failures?: ProviderError["kind"][];
  /** When set every call fails with this kind (after any scripted failures). */
  failAlways?: ProviderError["kind"];
}

export class MockAdapter implements ProviderAdapter {
  calls = 0;
  private readonly script: ProviderError["kind"][];

  constructor(readonly name: string, private readonly opts: MockAdapterOptions = {}) {
    this.script = [...(opts.failures ?? [])];
  }

  async generate(request: CompletionRequest, ctx: CallContext): Promise<ProviderResult> {
    this.calls++;
    if (this.opts.latencyMs) await sleep(this.opts.latencyMs, ctx.signal);

    const scripted = this.script.shift() ?? this.opts.failAlways;
    if (scripted) {
      throw new ProviderError(scripted, `${this.name} simulated ${scripted} failure`);
    }

    const content = this.opts.reply ?? mockResponse(this.name, request.messages);
    const usage = this.opts.usage
      ? { ...this.opts.usage, total: this.opts.usage.input + this.opts.usage.output }
      : completeUsage(request, content);
    return { content, usage, model: "mock" };
  }
}

function mockResponse(name: string, messages: readonly ChatMessage[]): string {
  const last = messages[messages.length - 1]?.content ?? "";
  return `[${name}] ${last.slice(0, 80)}`;
}
