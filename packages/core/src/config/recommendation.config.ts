import { z } from 'zod';
import { ConfigurationError, DEFAULT_CACHE_TTL_SECONDS, Environment } from '@tourpick/shared';

type DeepReadonly<T> = {
    readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().min(0);

/**
 * Recommendation pipeline settings. Every field has a default; overrides are
 * validated and the result is deep-frozen.
 */
const RecommendationConfigSchema = z.object({
    cache: z.object({
        backend: z.enum(['file', 'memory']).default('file'),
        directory: z.string().min(1).default('.cache/places'),
        ttlSeconds: positiveInt.default(DEFAULT_CACHE_TTL_SECONDS),
    }).default({}),

    fetch: z.object({
        language: z.string().min(2).default('es'),
        defaultRadius: positiveInt.default(20000),    // metres
        maxResultsPerCategory: positiveInt.default(8), // raw search results kept per category
        batchSize: positiveInt.default(3),             // detail lookups in flight per category
        pacingDelayMs: nonNegativeInt.default(100),    // between detail groups and between retries
        maxRetries: nonNegativeInt.default(2),
        maxConcurrentUpstream: positiveInt.default(6), // process-wide
        jobHistorySize: positiveInt.default(100),
    }).default({}),

    ranking: z.object({
        topPlacesPerCategory: positiveInt.default(5),
        minRecommendableScore: z.number().min(0).max(1).default(0.3),
    }).default({}),
});

export type RecommendationConfig = DeepReadonly<z.output<typeof RecommendationConfigSchema>>;

export type RecommendationConfigOverrides = z.input<typeof RecommendationConfigSchema>;

function deepFreeze<T extends object>(value: T): T {
    for (const child of Object.values(value)) {
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

export function createRecommendationConfig(overrides: RecommendationConfigOverrides = {}): RecommendationConfig {
    const result = RecommendationConfigSchema.safeParse(overrides);
    if (!result.success) {
        throw new ConfigurationError('Invalid recommendation config', {
            issues: result.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
        });
    }
    return deepFreeze(result.data);
}

export function configFromEnvironment(env: Environment): RecommendationConfig {
    return createRecommendationConfig({
        cache: {
            backend: env.CACHE_BACKEND,
            directory: env.CACHE_DIR,
            ttlSeconds: env.CACHE_TTL_SECONDS,
        },
        fetch: {
            language: env.PLACES_LANGUAGE,
            defaultRadius: env.SEARCH_DEFAULT_RADIUS,
            maxResultsPerCategory: env.MAX_RESULTS_PER_CATEGORY,
            batchSize: env.DETAIL_BATCH_SIZE,
            pacingDelayMs: env.PACING_DELAY_MS,
            maxRetries: env.UPSTREAM_MAX_RETRIES,
            maxConcurrentUpstream: env.UPSTREAM_MAX_CONCURRENCY,
        },
        ranking: {
            topPlacesPerCategory: env.TOP_PLACES_PER_CATEGORY,
        },
    });
}
