import logger from '../utils/logger.js';
import { cacheHits, cacheMisses } from '../observability/metrics.js';
import type { Place } from '../types/place.interface.js';
import {
    CacheEntry,
    CacheStats,
    CacheStore,
    CacheStoreOptions,
    DEFAULT_CACHE_TTL_SECONDS,
    isEntryValid,
    resolveTtl
} from './cache-store.js';

/**
 * In-process CacheStore. Same expiry and stats semantics as the file
 * backend, nothing survives a restart.
 */
export class MemoryCacheStore implements CacheStore {
    readonly backend = 'memory';
    readonly defaultTtlSeconds: number;
    private readonly entries = new Map<string, CacheEntry>();
    private readonly now: () => number;
    private hitCount = 0;
    private missCount = 0;

    constructor(options: CacheStoreOptions = {}) {
        this.defaultTtlSeconds = resolveTtl(options.defaultTtlSeconds, DEFAULT_CACHE_TTL_SECONDS);
        this.now = options.now ?? Date.now;
    }

    async get(key: string): Promise<CacheEntry | null> {
        const entry = this.entries.get(key);

        if (!entry || !isEntryValid(entry, this.now())) {
            this.missCount++;
            cacheMisses.inc({ backend: this.backend });
            return null;
        }

        this.hitCount++;
        cacheHits.inc({ backend: this.backend });
        // Copy so callers cannot mutate the stored payload
        return { ...entry, payload: structuredClone(entry.payload) };
    }

    async put(key: string, payload: Place[], ttlSeconds?: number): Promise<void> {
        this.entries.set(key, {
            key,
            payload: structuredClone(payload),
            storedAt: this.now(),
            ttlSeconds: resolveTtl(ttlSeconds, this.defaultTtlSeconds)
        });
    }

    async purgeExpired(): Promise<number> {
        const now = this.now();
        let removed = 0;

        for (const [key, entry] of this.entries) {
            if (!isEntryValid(entry, now)) {
                this.entries.delete(key);
                removed++;
            }
        }

        logger.debug({ removed, backend: this.backend }, 'Purged expired cache entries');
        return removed;
    }

    async clear(): Promise<number> {
        const removed = this.entries.size;
        this.entries.clear();
        return removed;
    }

    async stats(): Promise<CacheStats> {
        return {
            hitCount: this.hitCount,
            missCount: this.missCount,
            entryCount: this.entries.size
        };
    }
}
