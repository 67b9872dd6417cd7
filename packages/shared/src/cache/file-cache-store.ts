import fs from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger.js';
import { CacheCorruptionError } from '../types/errors.js';
import { cacheHits, cacheMisses } from '../observability/metrics.js';
import type { Place } from '../types/place.interface.js';
import {
    CacheEntry,
    CacheRecordSchema,
    CacheStats,
    CacheStore,
    CacheStoreOptions,
    DEFAULT_CACHE_TTL_SECONDS,
    isEntryValid,
    resolveTtl
} from './cache-store.js';

export interface FileCacheStoreOptions extends CacheStoreOptions {
    directory: string;
}

export interface CacheFileInfo {
    name: string;
    sizeBytes: number;
    modifiedAt: string;
}

export interface CacheDiskUsage {
    directory: string;
    fileCount: number;
    totalBytes: number;
    files: CacheFileInfo[]; // sorted by name
}

const RECORD_EXTENSION = '.json';
const TEMP_EXTENSION = '.tmp';

type ReadResult =
    | { status: 'ok'; entry: CacheEntry }
    | { status: 'missing' }
    | { status: 'corrupt'; error: CacheCorruptionError };

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * One JSON record per key under `directory`.
 * Writes land in a temp file that is renamed over the record, so readers
 * see either the previous record or the new one.
 */
export class FileCacheStore implements CacheStore {
    readonly backend = 'file';
    readonly defaultTtlSeconds: number;
    readonly directory: string;
    private readonly now: () => number;
    private hitCount = 0;
    private missCount = 0;

    constructor(options: FileCacheStoreOptions) {
        this.directory = path.resolve(options.directory);
        this.defaultTtlSeconds = resolveTtl(options.defaultTtlSeconds, DEFAULT_CACHE_TTL_SECONDS);
        this.now = options.now ?? Date.now;
        logger.info(`📦 FileCacheStore initialized (${this.directory}, default TTL: ${this.defaultTtlSeconds}s)`);
    }

    async get(key: string): Promise<CacheEntry | null> {
        const result = await this.readRecord(this.recordPath(key), key);

        if (result.status === 'ok' && isEntryValid(result.entry, this.now())) {
            this.hitCount++;
            cacheHits.inc({ backend: this.backend });
            logger.debug({ key }, 'Cache HIT');
            return result.entry;
        }

        if (result.status === 'corrupt') {
            logger.warn({ error: result.error.toJSON() }, '⚠️ Corrupt cache record treated as miss');
        }

        this.missCount++;
        cacheMisses.inc({ backend: this.backend });
        return null;
    }

    async put(key: string, payload: Place[], ttlSeconds?: number): Promise<void> {
        const entry: CacheEntry = {
            key,
            payload,
            storedAt: this.now(),
            ttlSeconds: resolveTtl(ttlSeconds, this.defaultTtlSeconds)
        };
        const target = this.recordPath(key);
        const temp = `${target}.${uuidv4()}${TEMP_EXTENSION}`;

        try {
            await fs.mkdir(this.directory, { recursive: true });
            await fs.writeFile(temp, JSON.stringify(entry), 'utf8');
            await fs.rename(temp, target);
            logger.debug({ key, ttlSeconds: entry.ttlSeconds, places: payload.length }, 'Cache SET');
        } catch (error) {
            logger.warn({ error, key }, 'FileCacheStore put failed');
            await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
                logger.debug({ error: cleanupError, temp }, 'Temp cache file cleanup failed');
            });
        }
    }

    /**
     * Removes stale records. Unreadable records are removed as well since
     * no read can ever return them.
     */
    async purgeExpired(): Promise<number> {
        const now = this.now();
        let removed = 0;

        for (const file of await this.listFiles(RECORD_EXTENSION)) {
            const result = await this.readRecord(file);
            if (result.status === 'missing') continue;

            if (result.status === 'corrupt' || !isEntryValid(result.entry, now)) {
                if (await this.removeFile(file)) removed++;
            }
        }

        logger.info({ removed, backend: this.backend }, '🧹 Purged expired cache entries');
        return removed;
    }

    async clear(): Promise<number> {
        let removed = 0;

        for (const file of await this.listFiles(RECORD_EXTENSION)) {
            if (await this.removeFile(file)) removed++;
        }
        // Leftovers from interrupted writes
        for (const file of await this.listFiles(TEMP_EXTENSION)) {
            await this.removeFile(file);
        }

        logger.info({ removed, backend: this.backend }, '🗑️ Cache cleared');
        return removed;
    }

    async stats(): Promise<CacheStats> {
        const records = await this.listFiles(RECORD_EXTENSION);
        return {
            hitCount: this.hitCount,
            missCount: this.missCount,
            entryCount: records.length
        };
    }

    /**
     * Size and listing of the stored records.
     */
    async diskUsage(): Promise<CacheDiskUsage> {
        const files: CacheFileInfo[] = [];

        for (const file of await this.listFiles(RECORD_EXTENSION)) {
            try {
                const info = await fs.stat(file);
                files.push({ name: path.basename(file), sizeBytes: info.size, modifiedAt: info.mtime.toISOString() });
            } catch (error) {
                // Removed between listing and stat
                if (!(isErrnoException(error) && error.code === 'ENOENT')) {
                    logger.warn({ error, file }, 'FileCacheStore stat failed');
                }
            }
        }

        files.sort((a, b) => a.name.localeCompare(b.name));
        return {
            directory: this.directory,
            fileCount: files.length,
            totalBytes: files.reduce((total, file) => total + file.sizeBytes, 0),
            files,
        };
    }

    private recordPath(key: string): string {
        const digest = createHash('sha256').update(key, 'utf8').digest('hex');
        return path.join(this.directory, `${digest}${RECORD_EXTENSION}`);
    }

    private async listFiles(extension: string): Promise<string[]> {
        try {
            const names = await fs.readdir(this.directory);
            return names
                .filter((name) => name.endsWith(extension))
                .map((name) => path.join(this.directory, name));
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return [];
            }
            logger.warn({ error, directory: this.directory }, 'FileCacheStore listing failed');
            return [];
        }
    }

    private async removeFile(file: string): Promise<boolean> {
        try {
            await fs.unlink(file);
            return true;
        } catch (error) {
            if (!(isErrnoException(error) && error.code === 'ENOENT')) {
                logger.warn({ error, file }, 'FileCacheStore remove failed');
            }
            return false;
        }
    }

    private async readRecord(file: string, expectedKey?: string): Promise<ReadResult> {
        let raw: string;
        try {
            raw = await fs.readFile(file, 'utf8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return { status: 'missing' };
            }
            const reason = error instanceof Error ? error.message : String(error);
            return { status: 'corrupt', error: new CacheCorruptionError(expectedKey ?? file, reason) };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'invalid JSON';
            return { status: 'corrupt', error: new CacheCorruptionError(expectedKey ?? file, reason) };
        }

        const record = CacheRecordSchema.safeParse(parsed);
        if (!record.success) {
            return {
                status: 'corrupt',
                error: new CacheCorruptionError(expectedKey ?? file, record.error.issues[0]?.message ?? 'schema mismatch')
            };
        }

        if (expectedKey !== undefined && record.data.key !== expectedKey) {
            return {
                status: 'corrupt',
                error: new CacheCorruptionError(expectedKey, 'record belongs to another key')
            };
        }

        return { status: 'ok', entry: record.data };
    }
}
