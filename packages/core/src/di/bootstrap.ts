import path from 'path';
import {
    CacheStore,
    Environment,
    FileCacheStore,
    MemoryCacheStore,
    PlacesProvider,
    Sleep,
    UpstreamSemaphore,
    logger
} from '@tourpick/shared';
import { GooglePlacesProvider } from '@tourpick/google-places';
import { RecommendationConfig, configFromEnvironment } from '../config/recommendation.config.js';
import { BatchFetchOrchestrator } from '../services/batch-fetch-orchestrator.js';
import { PreferenceScorer } from '../services/preference-scorer.js';
import { RecommendationAssembler } from '../services/recommendation-assembler.js';

export interface ServiceGraph {
    config: RecommendationConfig;
    cache: CacheStore;
    detailsCache: CacheStore;
    provider: PlacesProvider;
    orchestrator: BatchFetchOrchestrator;
    assembler: RecommendationAssembler;
}

export interface ServiceOverrides {
    cache?: CacheStore;
    detailsCache?: CacheStore;
    provider?: PlacesProvider;
    sleep?: Sleep;
}

export function createCacheStore(config: RecommendationConfig): CacheStore {
    if (config.cache.backend === 'memory') {
        return new MemoryCacheStore({ defaultTtlSeconds: config.cache.ttlSeconds });
    }
    return new FileCacheStore({ directory: config.cache.directory, defaultTtlSeconds: config.cache.ttlSeconds });
}

/**
 * Per-place details store, in a `details/` directory beside the search records.
 */
export function createDetailsCacheStore(config: RecommendationConfig): CacheStore {
    if (config.cache.backend === 'memory') {
        return new MemoryCacheStore({ defaultTtlSeconds: config.cache.ttlSeconds });
    }
    return new FileCacheStore({
        directory: path.join(config.cache.directory, 'details'),
        defaultTtlSeconds: config.cache.ttlSeconds,
    });
}

export function createServices(config: RecommendationConfig, env: Environment, overrides: ServiceOverrides = {}): ServiceGraph {
    const cache = overrides.cache ?? createCacheStore(config);
    const detailsCache = overrides.detailsCache ?? createDetailsCacheStore(config);
    const provider = overrides.provider ?? new GooglePlacesProvider({
        apiKey: env.GOOGLE_PLACES_API_KEY,
        language: config.fetch.language,
        timeoutMs: env.UPSTREAM_TIMEOUT_MS,
        circuitBreaker: {
            failureThreshold: env.PLACES_CIRCUIT_FAILURE_THRESHOLD,
            cooldownMs: env.PLACES_CIRCUIT_COOLDOWN_MS,
        },
    });

    // One semaphore for the whole process
    const semaphore = new UpstreamSemaphore(config.fetch.maxConcurrentUpstream);
    const orchestrator = new BatchFetchOrchestrator({
        cache,
        detailsCache,
        provider,
        config: config.fetch,
        semaphore,
        sleep: overrides.sleep,
    });
    const scorer = new PreferenceScorer(config.ranking.minRecommendableScore);
    const assembler = new RecommendationAssembler(orchestrator, scorer, cache, config, detailsCache);

    logger.debug({ cache: cache.backend, provider: provider.name }, 'Services wired');
    return { config, cache, detailsCache, provider, orchestrator, assembler };
}

export function bootstrapServices(env: Environment, overrides: ServiceOverrides = {}): ServiceGraph {
    logger.info('🔧 Wiring recommendation services...');
    return createServices(configFromEnvironment(env), env, overrides);
}
