import {
    CacheStats,
    CacheStore,
    Place,
    ScoredPlace,
    SearchParams,
    UserPreferenceProfile,
    logger,
    ValidationError,
    toApplicationError
} from '@tourpick/shared';
import type { RecommendationConfig } from '../config/recommendation.config.js';
import {
    CATEGORIES,
    City,
    DEFAULT_RECOMMENDATION_CATEGORIES,
    TourismCategory,
    buildCategoryQuery,
    getCity
} from '../catalog/tourism-catalog.js';
import { BatchFetchOrchestrator, FetchOptions } from './batch-fetch-orchestrator.js';
import { PreferenceScorer } from './preference-scorer.js';
import { limitResults } from './result-limiter.js';

export interface CategoryRequest {
    category: string;
    params: SearchParams;
}

export interface RecommendationRequest {
    profile: UserPreferenceProfile;
    categories: CategoryRequest[];
    /** Places kept per category after ranking */
    topN?: number;
    signal?: AbortSignal;
}

export interface CategoryRecommendation {
    category: string;
    totalFound: number; // after the limiter, before scoring
    aiFiltered: number; // after scoring and the rating floor
    places: ScoredPlace[];
    error?: { code: string; message: string };
}

export interface RecommendationResult {
    city?: City;
    profile: UserPreferenceProfile;
    categories: Record<string, CategoryRecommendation>;
    generatedAt: string;
}

export interface CacheSummary extends CacheStats {
    backend: string;
    defaultTtlSeconds: number;
    details: CacheStats | null; // null without a details store
}

interface CategoryEvaluation {
    limited: Place[];
    ranked: ScoredPlace[];
}

function assertUniqueCategories(categories: readonly CategoryRequest[]): void {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const { category } of categories) {
        if (seen.has(category)) duplicates.add(category);
        seen.add(category);
    }
    if (duplicates.size > 0) {
        throw new ValidationError(
            `Duplicate categories in request: ${[...duplicates].join(', ')}`,
            [...duplicates].map((category) => ({ field: 'categories', message: `"${category}" requested more than once` }))
        );
    }
}

/**
 * Top-level coordinator: fetch → limit → score, per category.
 */
export class RecommendationAssembler {
    constructor(
        private readonly orchestrator: BatchFetchOrchestrator,
        private readonly scorer: PreferenceScorer,
        private readonly cache: CacheStore,
        private readonly config: RecommendationConfig,
        private readonly detailsCache?: CacheStore
    ) {
        logger.info('🧭 Recommendation assembler initialized');
    }

    /**
     * Ranked places for one category. Fetch failures propagate.
     */
    async getRankedPlaces(
        category: string,
        params: SearchParams,
        profile: UserPreferenceProfile,
        maxCount: number = this.config.fetch.maxResultsPerCategory,
        options: FetchOptions = {}
    ): Promise<ScoredPlace[]> {
        const { ranked } = await this.evaluateCategory(category, params, profile, maxCount, options);
        return ranked;
    }

    /**
     * All categories run concurrently. A failing category is reported with
     * its error and no places; the others are unaffected.
     * Category names key the result, so each may appear once.
     */
    async recommend(request: RecommendationRequest): Promise<RecommendationResult> {
        assertUniqueCategories(request.categories);

        const topN = request.topN ?? this.config.ranking.topPlacesPerCategory;
        const maxCount = this.config.fetch.maxResultsPerCategory;

        const entries = await Promise.all(request.categories.map(async ({ category, params }): Promise<CategoryRecommendation> => {
            try {
                const { limited, ranked } = await this.evaluateCategory(
                    category, params, request.profile, maxCount, { signal: request.signal }
                );
                return {
                    category,
                    totalFound: limited.length,
                    aiFiltered: ranked.length,
                    places: ranked.slice(0, topN),
                };
            } catch (error) {
                const appError = toApplicationError(error);
                logger.warn({ category, error: appError.toJSON() }, '⚠️ Category degraded to empty result');
                return {
                    category,
                    totalFound: 0,
                    aiFiltered: 0,
                    places: [],
                    error: { code: appError.code, message: appError.message },
                };
            }
        }));

        const categories: Record<string, CategoryRecommendation> = {};
        for (const entry of entries) {
            categories[entry.category] = entry;
        }

        return {
            profile: request.profile,
            categories,
            generatedAt: new Date().toISOString(),
        };
    }

    /**
     * Recommendations for a known city, with catalog queries per category.
     */
    async recommendForCity(
        cityKey: string,
        profile: UserPreferenceProfile,
        categories: readonly TourismCategory[] = DEFAULT_RECOMMENDATION_CATEGORIES,
        options: { topN?: number; signal?: AbortSignal } = {}
    ): Promise<RecommendationResult> {
        const city = getCity(cityKey);
        logger.info({ city: city.key, categories }, '🏙️ Building city recommendations');

        const result = await this.recommend({
            profile,
            categories: categories.map((category) => ({
                category,
                params: this.cityCategoryParams(city, category),
            })),
            topN: options.topN,
            signal: options.signal,
        });

        return { ...result, city };
    }

    cityCategoryParams(city: City, category: TourismCategory): SearchParams {
        return {
            query: buildCategoryQuery(category, city),
            location: city.location,
            radius: this.config.fetch.defaultRadius,
            typeFilter: CATEGORIES[category].placeType,
            language: this.config.fetch.language,
        };
    }

    /**
     * Maintenance covers the search records and the details store together.
     */
    async purgeExpiredCache(): Promise<number> {
        const removed = await this.cache.purgeExpired();
        return removed + (this.detailsCache ? await this.detailsCache.purgeExpired() : 0);
    }

    async clearCache(): Promise<number> {
        const removed = await this.cache.clear();
        return removed + (this.detailsCache ? await this.detailsCache.clear() : 0);
    }

    async cacheStats(): Promise<CacheSummary> {
        const stats = await this.cache.stats();
        return {
            ...stats,
            backend: this.cache.backend,
            defaultTtlSeconds: this.cache.defaultTtlSeconds,
            details: this.detailsCache ? await this.detailsCache.stats() : null,
        };
    }

    private async evaluateCategory(
        category: string,
        params: SearchParams,
        profile: UserPreferenceProfile,
        maxCount: number,
        options: FetchOptions
    ): Promise<CategoryEvaluation> {
        const fetched = await this.orchestrator.fetchCategory(category, params, maxCount, options);
        const limited = limitResults(fetched, maxCount);
        const ranked = this.scorer.rank(limited, profile);

        logger.debug({ category, found: limited.length, ranked: ranked.length }, 'Category scored');
        return { limited, ranked };
    }
}
