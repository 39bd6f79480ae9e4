/**
 * Gateway configuration: a JSON file validated once at startup.
 *
 * API keys never live in the file. An openai-compatible adapter names the
 * environment variable holding its key (`apiKeyEnv`); index.ts loads .env
 * through dotenv before anything reads process.env.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const FailureKind = z.enum(["transient", "permanent", "unknown"]);
const Policy = z.enum(["cost", "latency", "round-robin", "pinned", "fallback"]);

const AdapterSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("openai-compatible"),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    apiKeyEnv: z.string().min(1),
    topP: z.number().min(0).max(1).optional(),
  }),
  z.object({
    type: z.literal("mock"),
    reply: z.string().optional(),
    latencyMs: z.number().int().nonnegative().optional(),
    usage: z.object({ input: z.number().int().nonnegative(), output: z.number().int().nonnegative() }).optional(),
    failures: z.array(FailureKind).optional(),
    failAlways: FailureKind.optional(),
  }),
]);

const ProviderSchema = z.object({
  name: z.string().min(1),
  capabilities: z.array(z.string().min(1)).min(1),
  costPer1kInput: z.number().nonnegative(),
  costPer1kOutput: z.number().nonnegative(),
  maxConcurrency: z.number().int().positive(),
  adapter: AdapterSchema,
});

const BudgetPeriod = z.enum(["hour", "day", "month", "total"]);

export const ConfigSchema = z
  .object({
    providers: z.array(ProviderSchema).min(1),
    routing: z
      .object({
        policy: Policy.default("cost"),
        secondary: Policy.exclude(["pinned"]).optional(),
        chain: z.array(z.string().min(1)).optional(),
        latencyWindow: z.number().int().positive().default(20),
      })
      .default({}),
    cache: z
      .object({
        maxEntries: z.number().int().nonnegative().default(1000),
        defaultTtlMs: z.number().int().nonnegative().default(300_000),
        ttlPolicy: z.enum(["absolute", "sliding"]).default("absolute"),
        sweepIntervalMs: z.number().int().nonnegative().default(60_000),
      })
      .default({}),
    resilience: z
      .object({
        failureThreshold: z.number().int().positive().default(3),
        windowMs: z.number().int().positive().default(60_000),
        cooldownMs: z.number().int().nonnegative().default(30_000),
        maxRetries: z.number().int().nonnegative().default(2),
        backoffBaseMs: z.number().nonnegative().default(200),
        maxBackoffMs: z.number().nonnegative().default(10_000),
      })
      .default({}),
    budgets: z
      .array(z.object({ principal: z.string().min(1), limit: z.number().nonnegative(), period: BudgetPeriod.default("day") }))
      .default([]),
    defaultBudget: z.object({ limit: z.number().nonnegative(), period: BudgetPeriod.default("day") }).optional(),
    defaults: z
      .object({
        maxTokens: z.number().int().positive().default(1024),
        temperature: z.number().min(0).max(2).default(0.7),
        timeoutMs: z.number().int().positive().default(30_000),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    const names = new Set<string>();
    for (const [i, p] of cfg.providers.entries()) {
      if (names.has(p.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["providers", i, "name"], message: `duplicate provider ${p.name}` });
      }
      names.add(p.name);
    }
    for (const [i, name] of (cfg.routing.chain ?? []).entries()) {
      if (!names.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["routing", "chain", i], message: `unknown provider ${name}` });
      }
    }
    const principals = new Set<string>();
    for (const [i, b] of cfg.budgets.entries()) {
      if (principals.has(b.principal)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["budgets", i, "principal"], message: `duplicate budget ${b.principal}` });
      }
      principals.add(b.principal);
    }
  });

export type GatewayConfig = z.infer<typeof ConfigSchema>;
export type ProviderConfig = GatewayConfig["providers"][number];
export type AdapterConfig = ProviderConfig["adapter"];

export function parseConfig(raw: unknown): GatewayConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid gateway config:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}

export function loadConfig(path: string): GatewayConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
  }
  return parseConfig(raw);
}

export function resolveApiKey(provider: string, envName: string, env: NodeJS.ProcessEnv): string {
  const value = env[envName];
  if (!value) {
    throw new ConfigError(`API key for provider ${provider} not found: set ${envName}`);
  }
  return value;
}
