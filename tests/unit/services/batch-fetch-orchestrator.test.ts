import { describe, it, expect, beforeEach } from 'vitest';
import {
    FetchAbortedError,
    MemoryCacheStore,
    QuotaExceededError,
    UpstreamSemaphore,
    UpstreamUnavailableError
} from '@tourpick/shared';
import { BatchFetchOrchestrator } from '@core/services/batch-fetch-orchestrator.js';
import { buildCacheKey } from '@core/services/request-key-builder.js';
import { createRecommendationConfig } from '@core/config/recommendation.config.js';
import { FakePlacesProvider, createRecordingSleep, makePlace } from '../../utils/test-helpers.js';

const params = {
    query: 'restaurantes Bogotá',
    location: { lat: 4.711, lng: -74.0721 },
    radius: 20000,
    typeFilter: 'restaurant',
};

function eightPlaces() {
    return Array.from({ length: 8 }, (_, i) => makePlace({ id: `p${i + 1}`, name: `Place ${i + 1}` }));
}

describe('BatchFetchOrchestrator', () => {
    let events: string[];
    let provider: FakePlacesProvider;
    let cache: MemoryCacheStore;
    let recording: ReturnType<typeof createRecordingSleep>;

    const build = (fetch: Parameters<typeof createRecommendationConfig>[0] = {}) => {
        const config = createRecommendationConfig(fetch);
        return new BatchFetchOrchestrator({
            cache,
            provider,
            config: config.fetch,
            sleep: recording.sleep,
        });
    };

    beforeEach(() => {
        events = [];
        provider = new FakePlacesProvider(events);
        cache = new MemoryCacheStore({ defaultTtlSeconds: 3600 });
        recording = createRecordingSleep(events);
    });

    describe('details cache', () => {
        let detailsCache: MemoryCacheStore;

        const buildWithDetails = () => new BatchFetchOrchestrator({
            cache,
            detailsCache,
            provider,
            config: createRecommendationConfig().fetch,
            sleep: recording.sleep,
        });

        beforeEach(() => {
            detailsCache = new MemoryCacheStore({ defaultTtlSeconds: 3600 });
            provider.searchResults = [makePlace({ id: 'p1' }), makePlace({ id: 'p2' })];
            provider.details.set('p1', makePlace({ id: 'p1', phone: '+57 1 555 0100' }));
            provider.details.set('p2', makePlace({ id: 'p2', phone: '+57 1 555 0200' }));
        });

        it('should look up details once per place across overlapping searches', async () => {
            const orchestrator = buildWithDetails();

            await orchestrator.fetchCategory('restaurants', params);
            const places = await orchestrator.fetchCategory('attractions', { ...params, query: 'sitios Bogotá' });

            expect(provider.searchCalls).toHaveLength(2);
            expect(provider.detailCalls).toEqual(['p1', 'p2']);
            expect(places.map((p) => p.phone)).toEqual(['+57 1 555 0100', '+57 1 555 0200']);
        });

        it('should keep details per language', async () => {
            const orchestrator = buildWithDetails();

            await orchestrator.fetchCategory('restaurants', params);
            await orchestrator.fetchCategory('restaurants', { ...params, language: 'en' });

            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p1', 'p2']);
        });

        it('should ask again for places the upstream had no details for', async () => {
            provider.details.set('p2', null);
            const orchestrator = buildWithDetails();

            await orchestrator.fetchCategory('restaurants', params);
            await orchestrator.fetchCategory('attractions', { ...params, query: 'sitios Bogotá' });

            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p2']);
            expect((await detailsCache.stats()).entryCount).toBe(1);
        });
    });

    describe('cache miss', () => {
        it('should fetch details in paced groups of batchSize', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            const places = await orchestrator.fetchCategory('restaurants', params);

            expect(places.map((p) => p.id)).toEqual(['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8']);
            expect(events).toEqual([
                'search:restaurantes Bogotá',
                'details:p1', 'details:p2', 'details:p3',
                'sleep:100',
                'details:p4', 'details:p5', 'details:p6',
                'sleep:100',
                'details:p7', 'details:p8',
            ]);
        });

        it('should pass the default language and limit to the provider', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params, 4);

            expect(provider.searchCalls).toHaveLength(1);
            expect(provider.searchCalls[0]).toMatchObject({
                query: 'restaurantes Bogotá',
                location: { lat: 4.711, lng: -74.0721 },
                radius: 20000,
                type: 'restaurant',
                language: 'es',
                maxResults: 4,
            });
            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p3', 'p4']);
        });

        it('should merge detail values over the search summary', async () => {
            provider.searchResults = [makePlace({ id: 'p1', name: 'Summary', reviewCount: 3 })];
            provider.details.set('p1', makePlace({
                id: 'p1',
                name: '',
                rating: 4.6,
                reviewCount: 120,
                priceLevel: 2,
                phone: '+57 1 555 0100',
            }));
            const orchestrator = build();

            const [place] = await orchestrator.fetchCategory('restaurants', params);

            expect(place.name).toBe('Summary');
            expect(place.rating).toBe(4.6);
            expect(place.reviewCount).toBe(120);
            expect(place.priceLevel).toBe(2);
            expect(place.phone).toBe('+57 1 555 0100');
        });

        it('should keep the summary location when details carry none', async () => {
            provider.searchResults = [makePlace({ id: 'p1', location: { lat: 4.6, lng: -74.08 } })];
            provider.details.set('p1', { ...makePlace({ id: 'p1', rating: 4.2 }), location: null });
            const orchestrator = build();

            const [place] = await orchestrator.fetchCategory('restaurants', params);

            expect(place.location).toEqual({ lat: 4.6, lng: -74.08 });
            expect(place.rating).toBe(4.2);
        });

        it('should keep the summary when details are missing', async () => {
            provider.searchResults = [makePlace({ id: 'p1', name: 'Only Summary', rating: 3.9 })];
            const orchestrator = build();

            const [place] = await orchestrator.fetchCategory('restaurants', params);

            expect(place.name).toBe('Only Summary');
            expect(place.rating).toBe(3.9);
        });

        it('should write the assembled payload under the normalized key', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params);

            const entry = await cache.get(buildCacheKey({ ...params, language: 'es' }));
            expect(entry?.payload).toHaveLength(8);
        });

        it('should cache an empty result', async () => {
            provider.searchResults = [];
            const orchestrator = build();

            expect(await orchestrator.fetchCategory('museums', params)).toEqual([]);
            expect(await orchestrator.fetchCategory('museums', params)).toEqual([]);

            expect(provider.searchCalls).toHaveLength(1);
            expect(provider.detailCalls).toHaveLength(0);
        });
    });

    describe('cache hit', () => {
        it('should serve an equivalent request without upstream calls', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            const first = await orchestrator.fetchCategory('restaurants', params);
            events.length = 0;

            const second = await orchestrator.fetchCategory('restaurants', {
                ...params,
                query: '  RESTAURANTES   bogotá ',
                location: '4.71100,-74.07210',
            });

            expect(second).toEqual(first);
            expect(events).toEqual([]);
            expect(provider.searchCalls).toHaveLength(1);
            expect(provider.detailCalls).toHaveLength(8);
        });

        it('should truncate the cached payload to the limit', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params);
            const places = await orchestrator.fetchCategory('restaurants', params, 2);

            expect(places.map((p) => p.id)).toEqual(['p1', 'p2']);
        });

        it('should refetch once the entry has expired', async () => {
            let now = 1_700_000_000_000;
            cache = new MemoryCacheStore({ defaultTtlSeconds: 3600, now: () => now });
            provider.searchResults = [makePlace({ id: 'p1' })];
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params);
            now += 3600 * 1000;
            await orchestrator.fetchCategory('restaurants', params);

            expect(provider.searchCalls).toHaveLength(2);
        });
    });

    describe('upstream failures', () => {
        it('should not retry a quota error', async () => {
            provider.searchErrors.push(new QuotaExceededError('fake-places', 'OVER_QUERY_LIMIT'));
            const orchestrator = build();

            await expect(orchestrator.fetchCategory('restaurants', params)).rejects.toBeInstanceOf(QuotaExceededError);

            expect(provider.searchCalls).toHaveLength(1);
            expect(recording.sleep).not.toHaveBeenCalled();
            expect((await cache.stats()).entryCount).toBe(0);
        });

        it('should retry an unavailable upstream up to maxRetries', async () => {
            provider.searchErrors.push(
                new UpstreamUnavailableError('fake-places', 'UNKNOWN_ERROR'),
                new UpstreamUnavailableError('fake-places', 'UNKNOWN_ERROR'),
                new UpstreamUnavailableError('fake-places', 'UNKNOWN_ERROR'),
            );
            const orchestrator = build();

            await expect(orchestrator.fetchCategory('restaurants', params)).rejects.toBeInstanceOf(UpstreamUnavailableError);

            expect(events).toEqual([
                'search:restaurantes Bogotá',
                'sleep:100',
                'search:restaurantes Bogotá',
                'sleep:100',
                'search:restaurantes Bogotá',
            ]);
            expect((await cache.stats()).entryCount).toBe(0);
        });

        it('should recover when a retry succeeds', async () => {
            provider.searchResults = [makePlace({ id: 'p1' })];
            provider.searchErrors.push(new UpstreamUnavailableError('fake-places', 'UNKNOWN_ERROR'));
            const orchestrator = build();

            const places = await orchestrator.fetchCategory('restaurants', params);

            expect(places).toHaveLength(1);
            expect(provider.searchCalls).toHaveLength(2);
            expect(recording.delays).toEqual([100]);
        });

        it('should treat unclassified provider errors as unavailable', async () => {
            provider.searchErrors.push(new Error('socket closed'), new Error('socket closed'), new Error('socket closed'));
            const orchestrator = build({ fetch: { maxRetries: 1 } });

            const failure = orchestrator.fetchCategory('restaurants', params);

            await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
            await expect(failure).rejects.toThrow('Upstream fake-places unavailable: socket closed');
            expect(provider.searchCalls).toHaveLength(2);
        });

        it('should retry a single detail lookup without repeating the group', async () => {
            provider.searchResults = eightPlaces().slice(0, 3);
            provider.detailErrors.set('p2', [new UpstreamUnavailableError('fake-places', 'UNKNOWN_ERROR')]);
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params);

            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p3', 'p2']);
        });

        it('should not write the cache when a detail lookup fails', async () => {
            provider.searchResults = eightPlaces();
            provider.detailErrors.set('p5', [new QuotaExceededError('fake-places', 'OVER_QUERY_LIMIT')]);
            const orchestrator = build();

            await expect(orchestrator.fetchCategory('restaurants', params)).rejects.toBeInstanceOf(QuotaExceededError);

            expect((await cache.stats()).entryCount).toBe(0);
            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p3', 'p4', 'p5', 'p6']);
        });
    });

    describe('cancellation', () => {
        it('should reject an already aborted request before any upstream call', async () => {
            const controller = new AbortController();
            controller.abort();
            const orchestrator = build();

            await expect(
                orchestrator.fetchCategory('hotels', params, undefined, { signal: controller.signal })
            ).rejects.toBeInstanceOf(FetchAbortedError);

            expect(provider.searchCalls).toHaveLength(0);
        });

        it('should stop between detail groups and leave the cache untouched', async () => {
            const controller = new AbortController();
            provider.searchResults = eightPlaces();
            const orchestrator = new BatchFetchOrchestrator({
                cache,
                provider,
                config: createRecommendationConfig().fetch,
                sleep: async () => controller.abort(),
            });

            await expect(
                orchestrator.fetchCategory('hotels', params, undefined, { signal: controller.signal })
            ).rejects.toThrow("Fetch for category 'hotels' was aborted");

            expect(provider.detailCalls).toEqual(['p1', 'p2', 'p3']);
            expect((await cache.stats()).entryCount).toBe(0);
        });
    });

    describe('job tracking', () => {
        it('should record a completed upstream job', async () => {
            provider.searchResults = eightPlaces();
            const orchestrator = build();

            await orchestrator.fetchCategory('restaurants', params);

            const [job] = orchestrator.getJobs();
            expect(job.category).toBe('restaurants');
            expect(job.state).toBe('done');
            expect(job.resultCount).toBe(8);
            expect(job.cacheKey).toBe(buildCacheKey({ ...params, language: 'es' }));
        });

        it('should record the error of a failed job', async () => {
            provider.searchErrors.push(new QuotaExceededError('fake-places', 'OVER_DAILY_LIMIT'));
            const orchestrator = build();

            await expect(orchestrator.fetchCategory('restaurants', params)).rejects.toThrow();

            const [job] = orchestrator.getJobs();
            expect(job.state).toBe('failed');
            expect(job.error).toEqual({
                code: 'QUOTA_EXCEEDED',
                message: 'Upstream fake-places quota exceeded (OVER_DAILY_LIMIT)',
            });
        });

        it('should record an aborted job', async () => {
            const controller = new AbortController();
            controller.abort();
            const orchestrator = build();

            await expect(
                orchestrator.fetchCategory('parks', params, undefined, { signal: controller.signal })
            ).rejects.toThrow();

            expect(orchestrator.getJobs()[0].error?.code).toBe('FETCH_ABORTED');
        });

        it('should keep a bounded job history', async () => {
            provider.searchResults = [makePlace({ id: 'p1' })];
            const orchestrator = build({ fetch: { jobHistorySize: 2 } });

            await orchestrator.fetchCategory('restaurants', params);
            await orchestrator.fetchCategory('hotels', { ...params, query: 'hoteles Bogotá' });
            await orchestrator.fetchCategory('parks', { ...params, query: 'parques Bogotá' });

            expect(orchestrator.getJobs().map((job) => job.category)).toEqual(['hotels', 'parks']);
        });

        it('should return copies of the jobs', async () => {
            provider.searchResults = [];
            const orchestrator = build();
            await orchestrator.fetchCategory('restaurants', params);

            const [copy] = orchestrator.getJobs();
            copy.state = 'failed';

            expect(orchestrator.getJobs()[0].state).toBe('done');
        });
    });

    describe('concurrency', () => {
        it('should never exceed the shared semaphore capacity', async () => {
            const semaphore = new UpstreamSemaphore(2);
            let active = 0;
            let peak = 0;
            provider.searchResults = eightPlaces().slice(0, 6);
            const original = provider.placeDetails.bind(provider);
            provider.placeDetails = async (id: string) => {
                active++;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setTimeout(resolve, 5));
                active--;
                return original(id);
            };

            const orchestrator = new BatchFetchOrchestrator({
                cache,
                provider,
                config: createRecommendationConfig({ fetch: { batchSize: 6 } }).fetch,
                semaphore,
                sleep: recording.sleep,
            });

            await orchestrator.fetchCategory('restaurants', params);

            expect(peak).toBe(2);
            expect(semaphore.inFlight).toBe(0);
        });
    });
});
