import { z } from 'zod';
import type { Place } from '../types/place.interface.js';

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface CacheEntry {
    key: string;
    payload: Place[];
    storedAt: number; // epoch ms
    ttlSeconds: number;
}

export interface CacheStats {
    hitCount: number;
    missCount: number;
    entryCount: number; // Stored records, stale ones included until purged
}

/**
 * Key → places store with expiry.
 *
 * `get` never returns an entry whose age has reached its ttl, but does not
 * delete it either; `purgeExpired` does. Storage failures never reach the
 * caller: reads degrade to a miss, writes are logged and dropped. A negative
 * or non-finite ttl is a caller error and `put` rejects it with a RangeError
 * before anything is stored.
 */
export interface CacheStore {
    readonly backend: string;
    readonly defaultTtlSeconds: number;
    get(key: string): Promise<CacheEntry | null>;
    put(key: string, payload: Place[], ttlSeconds?: number): Promise<void>;
    purgeExpired(): Promise<number>;
    clear(): Promise<number>;
    stats(): Promise<CacheStats>;
}

export interface CacheStoreOptions {
    defaultTtlSeconds?: number;
    now?: () => number;
}

export function isEntryValid(entry: Pick<CacheEntry, 'storedAt' | 'ttlSeconds'>, now: number): boolean {
    return now - entry.storedAt < entry.ttlSeconds * 1000;
}

export function resolveTtl(ttlSeconds: number | undefined, fallback: number): number {
    if (ttlSeconds === undefined) return fallback;
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
        throw new RangeError(`ttlSeconds must be a non-negative number, got ${ttlSeconds}`);
    }
    return ttlSeconds;
}

// ==========================================
// On-disk record schema
// ==========================================

const GeoPointSchema = z.object({
    lat: z.number(),
    lng: z.number()
});

export const PlaceSchema = z.object({
    id: z.string(),
    name: z.string(),
    address: z.string(),
    location: GeoPointSchema,
    rating: z.number().min(0).max(5).nullable(),
    reviewCount: z.number().int().min(0),
    priceLevel: z.number().int().min(0).max(4).nullable(),
    types: z.array(z.string()),
    openNow: z.boolean().nullable(),
    businessStatus: z.string().nullable(),
    photos: z.array(z.string()),
    phone: z.string().nullable(),
    website: z.string().nullable()
});

export const CacheRecordSchema = z.object({
    key: z.string(),
    payload: z.array(PlaceSchema),
    storedAt: z.number().int().nonnegative(),
    ttlSeconds: z.number().nonnegative()
});
