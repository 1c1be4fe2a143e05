import { logger } from '@src/lib/logger.js';
import type { CacheBackend } from '@src/lib/schema/cache-backend.js';
import type { SchemaDocument } from '@src/lib/schema/schema-types.js';

export interface SchemaCacheOptions {
    /** When false every lookup goes to the loader */
    enabled?: boolean;
    /** TTL handed to the persistent backend, in seconds */
    ttlSeconds?: number;
    /** Optional persistent store consulted after the memory map */
    backend?: CacheBackend;
}

/** Key prefix for entries written to the persistent backend */
const BACKEND_PREFIX = 'schema_';

/**
 * Recursively freeze a normalized document. Cached documents are shared across
 * requests, so nothing downstream may mutate them.
 */
function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Schema cache keyed by model name and namespace
 *
 * The memory map is never mutated in place: every write builds a new Map and
 * swaps the reference, so readers always see a complete snapshot. Concurrent
 * misses for the same key share one pending load. Invalidation bumps the key's
 * generation (clear() bumps a global epoch); a load started under an older
 * generation still answers its own callers but is never stored.
 *
 * Owned by the composition root (CrudService); tests build a fresh instance.
 */
export class SchemaCache {
    private entries: ReadonlyMap<string, SchemaDocument> = new Map();
    private readonly pending = new Map<string, Promise<SchemaDocument>>();
    private readonly generations = new Map<string, number>();
    private epoch = 0;
    private readonly enabled: boolean;
    private readonly ttlSeconds: number;
    private readonly backend?: CacheBackend;

    constructor(options: SchemaCacheOptions = {}) {
        this.enabled = options.enabled ?? true;
        this.ttlSeconds = options.ttlSeconds ?? 3600;
        this.backend = options.backend;
    }

    static key(model: string, namespace?: string): string {
        return `${model}:${namespace ?? 'default'}`;
    }

    /**
     * Memory-only lookup
     */
    get(model: string, namespace?: string): SchemaDocument | undefined {
        return this.entries.get(SchemaCache.key(model, namespace));
    }

    has(model: string, namespace?: string): boolean {
        return this.entries.has(SchemaCache.key(model, namespace));
    }

    /**
     * Store a document in memory and the backend. Returns the frozen document.
     */
    async set(model: string, namespace: string | undefined, schema: SchemaDocument): Promise<SchemaDocument> {
        const key = SchemaCache.key(model, namespace);
        const frozen = deepFreeze(schema);

        if (!this.enabled) {
            return frozen;
        }

        this.swap(next => next.set(key, frozen));

        if (this.backend) {
            try {
                await this.backend.set(BACKEND_PREFIX + key, frozen, this.ttlSeconds);
            } catch (error) {
                logger.warn('Schema cache backend write failed', { key, error: String(error) });
            }
        }

        return frozen;
    }

    /**
     * Read-through lookup: memory, then backend, then `load`
     */
    async getOrLoad(model: string, namespace: string | undefined, load: () => Promise<SchemaDocument>): Promise<SchemaDocument> {
        if (!this.enabled) {
            return deepFreeze(await load());
        }

        const key = SchemaCache.key(model, namespace);
        const cached = this.entries.get(key);
        if (cached) {
            logger.debug('Schema cache hit', { key });
            return cached;
        }

        const inFlight = this.pending.get(key);
        if (inFlight) {
            return inFlight;
        }

        const loading: Promise<SchemaDocument> = this.resolveMiss(model, namespace, key, load).finally(() => {
            if (this.pending.get(key) === loading) {
                this.pending.delete(key);
            }
        });
        this.pending.set(key, loading);

        return loading;
    }

    /**
     * Drop one model from memory and the backend
     */
    async invalidate(model: string, namespace?: string): Promise<void> {
        const key = SchemaCache.key(model, namespace);
        this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
        this.pending.delete(key);
        this.swap(next => next.delete(key));

        if (this.backend) {
            try {
                await this.backend.delete(BACKEND_PREFIX + key);
            } catch (error) {
                logger.warn('Schema cache backend delete failed', { key, error: String(error) });
            }
        }

        logger.debug('Schema cache invalidated', { key });
    }

    /**
     * Drop every in-memory entry. Backend entries expire by TTL.
     */
    clear(): void {
        this.epoch++;
        this.pending.clear();
        this.entries = new Map();
        logger.debug('Schema cache cleared');
    }

    get size(): number {
        return this.entries.size;
    }

    private async resolveMiss(
        model: string,
        namespace: string | undefined,
        key: string,
        load: () => Promise<SchemaDocument>
    ): Promise<SchemaDocument> {
        const generation = this.generation(key);

        const persisted = await this.readBackend(key);
        if (persisted) {
            logger.debug('Schema cache backend hit', { key });
            const frozen = deepFreeze(persisted);
            if (this.generation(key) === generation) {
                this.swap(next => next.set(key, frozen));
            }
            return frozen;
        }

        logger.debug('Schema cache miss', { key });
        const loaded = await load();

        if (this.generation(key) !== generation) {
            logger.debug('Schema invalidated while loading, result not cached', { key });
            return deepFreeze(loaded);
        }

        return this.set(model, namespace, loaded);
    }

    private generation(key: string): string {
        return `${this.epoch}:${this.generations.get(key) ?? 0}`;
    }

    private async readBackend(key: string): Promise<SchemaDocument | undefined> {
        if (!this.backend) {
            return undefined;
        }

        try {
            return await this.backend.get(BACKEND_PREFIX + key);
        } catch (error) {
            logger.warn('Schema cache backend read failed', { key, error: String(error) });
            return undefined;
        }
    }

    private swap(mutate: (next: Map<string, SchemaDocument>) => void): void {
        const next = new Map(this.entries);
        mutate(next);
        this.entries = next;
    }
}
