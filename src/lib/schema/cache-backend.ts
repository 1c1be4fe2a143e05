import type { SchemaDocument } from '@src/lib/schema/schema-types.js';

/**
 * Persistent store behind the in-memory schema cache (Redis, a database table,
 * a shared file ...). Implementations may throw; SchemaCache logs and ignores
 * backend failures.
 */
export interface CacheBackend {
    get(key: string): Promise<SchemaDocument | undefined>;
    set(key: string, value: SchemaDocument, ttlSeconds: number): Promise<void>;
    delete(key: string): Promise<void>;
}

interface Entry {
    value: SchemaDocument;
    expiresAt: number;
}

/**
 * Process-local CacheBackend with TTL expiry. A TTL of 0 never expires.
 */
export class MemoryCacheBackend implements CacheBackend {
    private readonly entries = new Map<string, Entry>();

    constructor(private readonly now: () => number = Date.now) {}

    async get(key: string): Promise<SchemaDocument | undefined> {
        const entry = this.entries.get(key);
        if (!entry) {
            return undefined;
        }

        if (entry.expiresAt !== 0 && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }

        return entry.value;
    }

    async set(key: string, value: SchemaDocument, ttlSeconds: number): Promise<void> {
        this.entries.set(key, {
            value,
            expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : 0,
        });
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    get size(): number {
        return this.entries.size;
    }
}
