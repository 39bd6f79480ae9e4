import { CapacityExceededError } from "./errors.js";
import type { ProviderAdapter } from "./dispatcher.js";
import type { CircuitState, ProviderDescriptor } from "./types.js";

export interface ProviderSpec {
    name: string;
    capabilities: string[];
    costPer1kInput: number;
    costPer1kOutput: number;
    maxConcurrency: number;
    adapter: ProviderAdapter;
}

/** Read-only view of breaker state, implemented by the resilience layer. */
export interface HealthSource {
    stateOf(provider: string): CircuitState;
}

export interface ProviderSlot {
    readonly provider: string;
    release(): void;
}

interface Entry {
    spec: ProviderSpec;
    inflight: number;
}

const ALWAYS_CLOSED: HealthSource = { stateOf: () => "CLOSED" };

/**
 * Static set of providers, in registration order. Owns the in-flight
 * counters; breaker health is read through the HealthSource.
 */
export class ProviderRegistry {
    private readonly entries = new Map<string, Entry>();
    private health: HealthSource = ALWAYS_CLOSED;

    constructor(specs: ProviderSpec[] = []) {
        for (const spec of specs) this.register(spec);
    }

    register(spec: ProviderSpec): void {
        if (this.entries.has(spec.name)) {
            throw new Error(`Duplicate provider: ${spec.name}`);
        }
        if (!Number.isInteger(spec.maxConcurrency) || spec.maxConcurrency < 1) {
            throw new Error(`Provider ${spec.name}: maxConcurrency must be a positive integer`);
        }
        this.entries.set(spec.name, { spec, inflight: 0 });
    }

    useHealthSource(source: HealthSource): void {
        this.health = source;
    }

    adapterFor(name: string): ProviderAdapter {
        return this.require(name).spec.adapter;
    }

    describe(name: string): ProviderDescriptor {
        return this.toDescriptor(this.require(name));
    }

    list(): ProviderDescriptor[] {
        return [...this.entries.values()].map((e) => this.toDescriptor(e));
    }

    /** Providers advertising every tag whose circuit is not OPEN. */
    listCapable(tags: readonly string[]): ProviderDescriptor[] {
        return this.list().filter(
            (d) => d.health !== "OPEN" && tags.every((t) => d.capabilities.includes(t)),
        );
    }

    reserve(name: string): ProviderSlot {
        const entry = this.require(name);
        if (entry.inflight >= entry.spec.maxConcurrency) {
            throw new CapacityExceededError(name, entry.spec.maxConcurrency);
        }
        entry.inflight++;

        let released = false;
        return {
            provider: name,
            release: () => {
                if (released) return;
                released = true;
                this.release(name);
            },
        };
    }

    release(name: string): void {
        const entry = this.require(name);
        entry.inflight = Math.max(0, entry.inflight - 1);
    }

    private require(name: string): Entry {
        const entry = this.entries.get(name);
        if (!entry) throw new Error(`Unknown provider: ${name}`);
        return entry;
    }

    private toDescriptor(entry: Entry): ProviderDescriptor {
        const { spec } = entry;
        return {
            name: spec.name,
            capabilities: [...spec.capabilities],
            costPer1kInput: spec.costPer1kInput,
            costPer1kOutput: spec.costPer1kOutput,
            maxConcurrency: spec.maxConcurrency,
            inflight: entry.inflight,
            health: this.health.stateOf(spec.name),
        };
    }
}
