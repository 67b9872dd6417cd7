import type { Place, ScoredPlace, UserPreferenceProfile } from '@tourpick/shared';

export const SCORE_WEIGHTS = Object.freeze({
    rating: 0.4,
    priceFit: 0.2,
    popularity: 0.2,
    categoryMatch: 0.2,
});

export const POPULARITY_SATURATION_REVIEWS = 100;
export const DEFAULT_CATEGORY_WEIGHT = 0.1;
export const MIN_RECOMMENDABLE_SCORE = 0.3;
export const MAX_MATCH_REASONS = 3;

export interface ScoreBreakdown {
    rating: number;
    priceFit: number;
    popularity: number;
    categoryMatch: number;
    /** Highest weight among the place's own tags, null when none is weighted */
    matchedWeight: number | null;
}

function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

function roundScore(value: number): number {
    return Math.round(value * 10000) / 10000;
}

function compareCodePoints(a: string, b: string): number {
    const left = Array.from(a);
    const right = Array.from(b);
    const length = Math.min(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
        if (diff !== 0) return diff;
    }
    return left.length - right.length;
}

/**
 * Ranking order: aiScore desc, reviewCount desc, name by code point.
 */
export function compareScoredPlaces(a: ScoredPlace, b: ScoredPlace): number {
    if (a.aiScore !== b.aiScore) return b.aiScore - a.aiScore;
    if (a.place.reviewCount !== b.place.reviewCount) return b.place.reviewCount - a.place.reviewCount;
    return compareCodePoints(a.place.name, b.place.name);
}

export function ratingScore(place: Place): number {
    return place.rating === null ? 0 : clamp01(place.rating / 5);
}

export function priceFitScore(place: Place, maxPriceTier: number): number {
    if (place.priceLevel === null || place.priceLevel <= maxPriceTier) return 1;
    return Math.max(0, 1 - 0.25 * (place.priceLevel - maxPriceTier));
}

export function popularityScore(reviewCount: number, saturation: number = POPULARITY_SATURATION_REVIEWS): number {
    if (reviewCount <= 0) return 0;
    return Math.min(1, Math.log(1 + reviewCount) / Math.log(1 + saturation));
}

export function matchedCategoryWeight(place: Place, weights: Readonly<Record<string, number>>): number | null {
    let best: number | null = null;
    for (const tag of place.types) {
        if (!Object.prototype.hasOwnProperty.call(weights, tag)) continue;
        const weight = weights[tag];
        if (best === null || weight > best) best = weight;
    }
    return best;
}

/**
 * Scores places against a preference profile. Pure: the profile and the
 * places are only read.
 */
export class PreferenceScorer {
    constructor(private readonly minRecommendableScore: number = MIN_RECOMMENDABLE_SCORE) { }

    breakdown(place: Place, profile: UserPreferenceProfile): ScoreBreakdown {
        const matchedWeight = matchedCategoryWeight(place, profile.categoryWeights);
        return {
            rating: ratingScore(place),
            priceFit: priceFitScore(place, profile.maxPriceTier),
            popularity: popularityScore(place.reviewCount),
            categoryMatch: matchedWeight === null ? DEFAULT_CATEGORY_WEIGHT : clamp01(matchedWeight),
            matchedWeight,
        };
    }

    /**
     * null when the place is rated below the profile's minimum.
     * Unrated places are scored with 0 on the rating term.
     */
    score(place: Place, profile: UserPreferenceProfile): ScoredPlace | null {
        if (place.rating !== null && place.rating < profile.minRating) {
            return null;
        }

        const parts = this.breakdown(place, profile);
        const aiScore = roundScore(
            SCORE_WEIGHTS.rating * parts.rating +
            SCORE_WEIGHTS.priceFit * parts.priceFit +
            SCORE_WEIGHTS.popularity * parts.popularity +
            SCORE_WEIGHTS.categoryMatch * parts.categoryMatch
        );

        return {
            place,
            aiScore,
            matchReasons: this.matchReasons(place, parts),
        };
    }

    /**
     * Scored places above the recommendable minimum, best first.
     */
    rank(places: readonly Place[], profile: UserPreferenceProfile): ScoredPlace[] {
        return places
            .map((place) => this.score(place, profile))
            .filter((scored): scored is ScoredPlace => scored !== null && scored.aiScore > this.minRecommendableScore)
            .sort(compareScoredPlaces);
    }

    private matchReasons(place: Place, parts: ScoreBreakdown): string[] {
        const reasons: string[] = [];

        if (place.rating !== null && place.rating >= 4.0) reasons.push('high rating');
        if (parts.priceFit === 1 && place.priceLevel !== null && place.priceLevel <= 2) reasons.push('budget friendly');
        if (place.reviewCount >= 10) reasons.push('well reviewed');
        if (parts.matchedWeight !== null && parts.matchedWeight >= 0.5) reasons.push('matches your interests');
        if (place.openNow === true) reasons.push('open now');

        return reasons.slice(0, MAX_MATCH_REASONS);
    }
}
