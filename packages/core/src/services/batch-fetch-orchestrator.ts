import { v4 as uuidv4 } from 'uuid';
import {
    CacheStore,
    FetchAbortedError,
    InternalServerError,
    Place,
    PlaceDetails,
    PlacesProvider,
    RetryPolicy,
    SearchParams,
    Sleep,
    UpstreamSemaphore,
    UpstreamUnavailableError,
    categoryFetchDuration,
    defaultSleep,
    executeWithRetry,
    fetchJobTransitions,
    isAppError,
    isRetryableError,
    logger,
    toApplicationError,
    upstreamRetries,
    withLogContext
} from '@tourpick/shared';
import type { RecommendationConfig } from '../config/recommendation.config.js';
import { buildCacheKey, buildDetailsCacheKey, parseLocation } from './request-key-builder.js';

export type FetchJobState = 'pending' | 'cached' | 'fetching' | 'done' | 'failed';

export interface FetchJob {
    id: string;
    category: string;
    params: SearchParams;
    cacheKey?: string;
    state: FetchJobState;
    createdAt: string;
    updatedAt: string;
    resultCount?: number;
    error?: { code: string; message: string };
}

const ALLOWED_TRANSITIONS: Readonly<Record<FetchJobState, readonly FetchJobState[]>> = {
    pending: ['cached', 'fetching', 'failed'],
    cached: ['done'],
    fetching: ['done', 'failed'],
    done: [],
    failed: [],
};

export interface FetchOptions {
    signal?: AbortSignal;
}

export interface BatchFetchOrchestratorOptions {
    cache: CacheStore;
    /** Per-place details, shared across searches. Without it every lookup goes upstream. */
    detailsCache?: CacheStore;
    provider: PlacesProvider;
    config: RecommendationConfig['fetch'];
    semaphore?: UpstreamSemaphore;
    sleep?: Sleep;
}

type UpstreamOperation = 'textSearch' | 'placeDetails';

/**
 * Prefer detail values, fall back to the search summary where details are empty.
 */
function mergeDetails(summary: Place, details: PlaceDetails | null): Place {
    if (!details) return summary;
    return {
        ...summary,
        name: details.name || summary.name,
        address: details.address || summary.address,
        location: details.location ?? summary.location,
        rating: details.rating ?? summary.rating,
        reviewCount: Math.max(details.reviewCount, summary.reviewCount),
        priceLevel: details.priceLevel ?? summary.priceLevel,
        types: details.types.length > 0 ? details.types : summary.types,
        openNow: details.openNow ?? summary.openNow,
        businessStatus: details.businessStatus ?? summary.businessStatus,
        photos: details.photos.length > 0 ? details.photos : summary.photos,
        phone: details.phone ?? summary.phone,
        website: details.website ?? summary.website,
    };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const groups: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        groups.push(items.slice(i, i + size));
    }
    return groups;
}

/**
 * Cache-first category fetcher.
 *
 * On a miss: one text search, then detail lookups in groups of `batchSize`
 * with `pacingDelayMs` between groups. The cache is written only once the
 * whole payload is assembled. Every upstream call goes through the shared
 * semaphore and the retry policy.
 *
 * Detail lookups check the details cache first, so a place already enriched
 * for another query, category or city costs no upstream call.
 */
export class BatchFetchOrchestrator {
    private readonly cache: CacheStore;
    private readonly detailsCache?: CacheStore;
    private readonly provider: PlacesProvider;
    private readonly config: RecommendationConfig['fetch'];
    private readonly semaphore: UpstreamSemaphore;
    private readonly sleep: Sleep;
    private readonly retryPolicy: RetryPolicy;
    private readonly jobs: FetchJob[] = [];

    constructor(options: BatchFetchOrchestratorOptions) {
        this.cache = options.cache;
        this.detailsCache = options.detailsCache;
        this.provider = options.provider;
        this.config = options.config;
        this.semaphore = options.semaphore ?? new UpstreamSemaphore(options.config.maxConcurrentUpstream);
        this.sleep = options.sleep ?? defaultSleep;
        this.retryPolicy = {
            maxRetries: options.config.maxRetries,
            baseDelayMs: options.config.pacingDelayMs,
            backoffMultiplier: 1,
        };
    }

    /**
     * Places for one category, at most `limit` of them, in upstream relevance order.
     * Throws QuotaExceededError, UpstreamUnavailableError or FetchAbortedError.
     */
    async fetchCategory(
        category: string,
        params: SearchParams,
        limit: number = this.config.maxResultsPerCategory,
        options: FetchOptions = {}
    ): Promise<Place[]> {
        const job = this.createJob(category, params);
        const endTimer = categoryFetchDuration.startTimer({ category });

        return withLogContext({ category, jobId: job.id }, async () => {
            try {
                this.throwIfAborted(category, options.signal);

                const searchParams: SearchParams = { ...params, language: params.language ?? this.config.language };
                const key = buildCacheKey(searchParams);
                job.cacheKey = key;

                const entry = await this.cache.get(key);
                if (entry) {
                    this.transition(job, 'cached');
                    const places = entry.payload.slice(0, limit);
                    job.resultCount = places.length;
                    this.transition(job, 'done');
                    endTimer({ source: 'cache' });
                    logger.info({ count: places.length }, '📦 Returning cached places');
                    return places;
                }

                this.transition(job, 'fetching');
                const places = await this.fetchFromUpstream(category, searchParams, limit, options.signal);

                this.throwIfAborted(category, options.signal);
                await this.cache.put(key, places);

                job.resultCount = places.length;
                this.transition(job, 'done');
                endTimer({ source: 'upstream' });
                logger.info({ count: places.length }, '✅ Category fetch complete');
                return places;
            } catch (error) {
                const failure = options.signal?.aborted && !(error instanceof FetchAbortedError)
                    ? new FetchAbortedError(category, { cause: error instanceof Error ? error.message : String(error) })
                    : error;
                const appError = toApplicationError(failure);

                job.error = { code: appError.code, message: appError.message };
                this.transition(job, 'failed');
                endTimer({ source: 'error' });
                logger.warn({ error: appError.toJSON() }, '❌ Category fetch failed');
                throw failure;
            }
        });
    }

    /**
     * Snapshot of recent jobs, oldest first.
     */
    getJobs(): FetchJob[] {
        return this.jobs.map((job) => ({ ...job }));
    }

    private async fetchFromUpstream(
        category: string,
        params: SearchParams,
        limit: number,
        signal?: AbortSignal
    ): Promise<Place[]> {
        const summaries = await this.callUpstream('textSearch', category, signal, () =>
            this.provider.textSearch({
                query: params.query,
                location: params.location !== undefined ? parseLocation(params.location) : undefined,
                radius: params.radius,
                type: params.typeFilter?.trim() || undefined,
                language: params.language,
                maxResults: limit,
                signal,
            })
        );
        const raw = summaries.slice(0, limit);

        if (raw.length === 0) {
            logger.info('No places found, caching empty result');
            return [];
        }

        const places: Place[] = [];
        const groups = chunk(raw, this.config.batchSize);

        for (const [index, group] of groups.entries()) {
            if (index > 0) {
                await this.sleep(this.config.pacingDelayMs);
            }
            this.throwIfAborted(category, signal);

            const detailed = await Promise.all(
                group.map((summary) => this.enrich(category, summary, params.language, signal))
            );
            places.push(...detailed);

            logger.debug({ group: index + 1, groups: groups.length }, 'Detail group complete');
        }

        return places;
    }

    /**
     * Search summary merged with the place's details. Only details the upstream
     * actually returned are cached; an unknown place is asked for again next time.
     */
    private async enrich(category: string, summary: Place, language: string | undefined, signal?: AbortSignal): Promise<Place> {
        const key = buildDetailsCacheKey(summary.id, language);
        const entry = this.detailsCache ? await this.detailsCache.get(key) : null;
        const [cached] = entry?.payload ?? [];
        if (cached) {
            logger.debug({ placeId: summary.id }, 'Details served from cache');
            return mergeDetails(summary, cached);
        }

        const details = await this.callUpstream('placeDetails', category, signal, () =>
            this.provider.placeDetails(summary.id, { language, signal })
        );
        const merged = mergeDetails(summary, details);

        if (details && this.detailsCache) {
            await this.detailsCache.put(key, [merged]);
        }
        return merged;
    }

    private callUpstream<T>(
        operation: UpstreamOperation,
        category: string,
        signal: AbortSignal | undefined,
        call: () => Promise<T>
    ): Promise<T> {
        return executeWithRetry(async () => {
            this.throwIfAborted(category, signal);
            try {
                return await this.semaphore.run(call);
            } catch (error) {
                if (isAppError(error) || signal?.aborted) throw error;
                // Unclassified provider failures count as transient
                throw new UpstreamUnavailableError(this.provider.name, error instanceof Error ? error.message : String(error));
            }
        }, {
            policy: this.retryPolicy,
            sleep: this.sleep,
            label: operation,
            shouldRetry: (error) => !signal?.aborted && isRetryableError(error),
            onRetry: () => upstreamRetries.inc({ operation }),
        });
    }

    private throwIfAborted(category: string, signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new FetchAbortedError(category);
        }
    }

    private createJob(category: string, params: SearchParams): FetchJob {
        const now = new Date().toISOString();
        const job: FetchJob = {
            id: uuidv4(),
            category,
            params: { ...params },
            state: 'pending',
            createdAt: now,
            updatedAt: now,
        };

        this.jobs.push(job);
        this.evictJobs();
        return job;
    }

    private transition(job: FetchJob, next: FetchJobState): void {
        if (!ALLOWED_TRANSITIONS[job.state].includes(next)) {
            throw new InternalServerError(`Invalid fetch job transition ${job.state} -> ${next}`, { jobId: job.id });
        }
        fetchJobTransitions.inc({ from_state: job.state, to_state: next });
        job.state = next;
        job.updatedAt = new Date().toISOString();
    }

    private evictJobs(): void {
        while (this.jobs.length > this.config.jobHistorySize) {
            const index = this.jobs.findIndex((job) => job.state === 'done' || job.state === 'failed');
            if (index === -1) break;
            this.jobs.splice(index, 1);
        }
    }
}
