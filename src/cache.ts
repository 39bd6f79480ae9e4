/**
 * Response cache keyed by request fingerprint.
 *
 * Expiry: entries past their TTL are treated as misses and evicted on the
 * lookup that finds them. startSweeper() additionally removes expired
 * entries on an interval so idle keys do not hold memory.
 *
 * Capacity: least-recently-used eviction once maxEntries is exceeded.
 *
 * Store failures never fail a request: get() degrades to a miss and put()
 * to a no-op, both logged.
 */

import { createHash } from "node:crypto";
import type { CacheEntry, Clock, CompletionRequest, CompletionResponse } from "./types.js";

export type TtlPolicy = "absolute" | "sliding";

export interface CacheSettings {
  maxEntries: number;
  defaultTtlMs: number;
  ttlPolicy?: TtlPolicy;
  sweepIntervalMs?: number;
}

/** Backing store. Iteration order of keys() is least- to most-recently used. */
export interface CacheStore {
  get(fingerprint: string): CacheEntry | undefined;
  /** Like get() without touching recency. */
  peek(fingerprint: string): CacheEntry | undefined;
  set(fingerprint: string, entry: CacheEntry): void;
  delete(fingerprint: string): boolean;
  keys(): IterableIterator<string>;
  clear(): void;
  readonly size: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly map = new Map<string, CacheEntry>();

  get(fingerprint: string): CacheEntry | undefined {
    const entry = this.map.get(fingerprint);
    if (entry) {
      // re-insert to mark as most recently used
      this.map.delete(fingerprint);
      this.map.set(fingerprint, entry);
    }
    return entry;
  }

  peek(fingerprint: string): CacheEntry | undefined {
    return this.map.get(fingerprint);
  }

  set(fingerprint: string, entry: CacheEntry): void {
    this.map.delete(fingerprint);
    this.map.set(fingerprint, entry);
  }

  delete(fingerprint: string): boolean {
    return this.map.delete(fingerprint);
  }

  keys(): IterableIterator<string> {
    return this.map.keys();
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}

function normalizeContent(content: string): string {
  return content.trim().replace(/\s+/g, " ");
}

export function fingerprint(request: CompletionRequest): string {
  const canonical = JSON.stringify({
    messages: request.messages.map((m) => [m.role, normalizeContent(m.content)]),
    capabilities: [...request.capabilities].sort(),
    temperature: request.temperature,
    maxTokens: request.maxTokens,
    provider: request.preferredProvider ?? null,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

export interface CacheLookup {
  hit: boolean;
  entry?: CacheEntry;
}

export class CacheLayer {
  private sweeper: ReturnType<typeof setInterval> | null = null;
  private readonly ttlPolicy: TtlPolicy;

  constructor(
    private readonly settings: CacheSettings,
    private readonly store: CacheStore = new MemoryCacheStore(),
    private readonly now: Clock = Date.now,
  ) {
    this.ttlPolicy = settings.ttlPolicy ?? "absolute";
  }

  get(fp: string): CacheLookup {
    try {
      const entry = this.store.get(fp);
      if (!entry) return { hit: false };

      const now = this.now();
      if (this.isExpired(entry, now)) {
        this.store.delete(fp);
        return { hit: false };
      }

      entry.hitCount++;
      if (this.ttlPolicy === "sliding") entry.createdAt = now;
      return { hit: true, entry };
    } catch (err: unknown) {
      console.warn(`[Cache] lookup failed, treating as miss: ${describe(err)}`);
      return { hit: false };
    }
  }

  put(fp: string, response: CompletionResponse, ttlMs = this.settings.defaultTtlMs): void {
    if (ttlMs <= 0 || this.settings.maxEntries <= 0) return;
    try {
      this.store.set(fp, {
        fingerprint: fp,
        response: { ...response, usage: { ...response.usage } },
        createdAt: this.now(),
        ttlMs,
        hitCount: 0,
      });
      while (this.store.size > this.settings.maxEntries) {
        const oldest = this.store.keys().next();
        if (oldest.done) break;
        this.store.delete(oldest.value);
      }
    } catch (err: unknown) {
      console.warn(`[Cache] store failed, entry dropped: ${describe(err)}`);
    }
  }

  invalidate(fp: string): boolean {
    try {
      return this.store.delete(fp);
    } catch (err: unknown) {
      console.warn(`[Cache] invalidate failed: ${describe(err)}`);
      return false;
    }
  }

  clear(): void {
    try {
      this.store.clear();
    } catch (err: unknown) {
      console.warn(`[Cache] clear failed: ${describe(err)}`);
    }
  }

  /** Removes every expired entry; returns how many were evicted. */
  sweep(): number {
    const now = this.now();
    let evicted = 0;
    try {
      for (const fp of [...this.store.keys()]) {
        const entry = this.store.peek(fp);
        if (entry && this.isExpired(entry, now)) {
          this.store.delete(fp);
          evicted++;
        }
      }
    } catch (err: unknown) {
      console.warn(`[Cache] sweep failed: ${describe(err)}`);
    }
    return evicted;
  }

  startSweeper(): void {
    const interval = this.settings.sweepIntervalMs ?? 0;
    if (this.sweeper || interval <= 0) return;
    this.sweeper = setInterval(() => this.sweep(), interval);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  get size(): number {
    return this.store.size;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt >= entry.ttlMs;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
