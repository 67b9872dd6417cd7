import { describe, it, expect } from 'vitest';
import type { ScoredPlace } from '@tourpick/shared';
import {
    DEFAULT_CATEGORY_WEIGHT,
    PreferenceScorer,
    compareScoredPlaces,
    matchedCategoryWeight,
    popularityScore,
    priceFitScore,
    ratingScore
} from '@core/services/preference-scorer.js';
import { makePlace, makeProfile } from '../../utils/test-helpers.js';

describe('PreferenceScorer', () => {
    const scorer = new PreferenceScorer();

    describe('sub-scores', () => {
        it('should scale rating to [0,1] and score unrated places 0', () => {
            expect(ratingScore(makePlace({ rating: 4.5 }))).toBe(0.9);
            expect(ratingScore(makePlace({ rating: 5 }))).toBe(1);
            expect(ratingScore(makePlace({ rating: null }))).toBe(0);
        });

        it('should penalize each price tier above the maximum by 0.25', () => {
            expect(priceFitScore(makePlace({ priceLevel: 2 }), 2)).toBe(1);
            expect(priceFitScore(makePlace({ priceLevel: 3 }), 2)).toBe(0.75);
            expect(priceFitScore(makePlace({ priceLevel: 4 }), 2)).toBe(0.5);
            expect(priceFitScore(makePlace({ priceLevel: 4 }), 0)).toBe(0);
            expect(priceFitScore(makePlace({ priceLevel: null }), 0)).toBe(1);
        });

        it('should saturate popularity at 100 reviews', () => {
            expect(popularityScore(0)).toBe(0);
            expect(popularityScore(100)).toBe(1);
            expect(popularityScore(5000)).toBe(1);
            expect(popularityScore(9)).toBeCloseTo(Math.log(10) / Math.log(101), 10);
        });

        it('should take the highest weight among the place tags', () => {
            const place = makePlace({ types: ['museum', 'park', 'point_of_interest'] });

            expect(matchedCategoryWeight(place, { museum: 0.4, park: 0.9 })).toBe(0.9);
            expect(matchedCategoryWeight(place, { restaurant: 1 })).toBeNull();
        });

        it('should use the default category weight when no tag is weighted', () => {
            const parts = scorer.breakdown(makePlace({ types: ['bar'] }), makeProfile({ categoryWeights: { museum: 1 } }));

            expect(parts.categoryMatch).toBe(DEFAULT_CATEGORY_WEIGHT);
            expect(parts.matchedWeight).toBeNull();
        });

        it('should clamp category weights above 1', () => {
            const parts = scorer.breakdown(makePlace({ types: ['museum'] }), makeProfile({ categoryWeights: { museum: 2 } }));
            expect(parts.categoryMatch).toBe(1);
        });
    });

    describe('score', () => {
        it('should combine the weighted sub-scores', () => {
            const place = makePlace({
                rating: 4.5,
                reviewCount: 100,
                priceLevel: 2,
                types: ['museum', 'point_of_interest'],
                openNow: true,
            });
            const profile = makeProfile({ maxPriceTier: 3, categoryWeights: { museum: 1 } });

            const scored = scorer.score(place, profile);

            expect(scored?.aiScore).toBe(0.96);
            expect(scored?.matchReasons).toEqual(['high rating', 'budget friendly', 'well reviewed']);
        });

        it('should round the score to 4 decimals', () => {
            const place = makePlace({ rating: 3, reviewCount: 5, priceLevel: 3, types: ['park'], openNow: true });
            const profile = makeProfile({ maxPriceTier: 3, categoryWeights: { park: 0.6 } });

            const scored = scorer.score(place, profile);

            expect(scored?.aiScore).toBe(0.6376);
            expect(scored?.matchReasons).toEqual(['matches your interests', 'open now']);
        });

        it('should return null below the rating floor and keep ratings equal to it', () => {
            const profile = makeProfile({ minRating: 4 });

            expect(scorer.score(makePlace({ rating: 3.9 }), profile)).toBeNull();
            expect(scorer.score(makePlace({ rating: 4 }), profile)).not.toBeNull();
        });

        it('should not apply the rating floor to unrated places', () => {
            const scored = scorer.score(makePlace({ rating: null }), makeProfile({ minRating: 4.5 }));

            expect(scored?.aiScore).toBe(0.22);
            expect(scored?.matchReasons).toEqual([]);
        });

        it('should not call a place without a price tier budget friendly', () => {
            const scored = scorer.score(makePlace({ rating: 3, priceLevel: null }), makeProfile());
            expect(scored?.matchReasons).toEqual([]);
        });

        it('should not mutate its inputs', () => {
            const place = makePlace({ rating: 4.1, reviewCount: 40, types: ['museum'] });
            const profile = makeProfile({ categoryWeights: { museum: 0.7 } });
            const before = structuredClone({ place, profile });

            scorer.score(place, profile);

            expect({ place, profile }).toEqual(before);
        });
    });

    describe('rank', () => {
        it('should keep only places at or above the rating floor', () => {
            const places = [
                makePlace({ id: 'a', name: 'A', rating: 3.5 }),
                makePlace({ id: 'b', name: 'B', rating: 4.2 }),
                makePlace({ id: 'c', name: 'C', rating: 4.8 }),
                makePlace({ id: 'd', name: 'D', rating: null }),
            ];

            const ranked = scorer.rank(places, makeProfile({ minRating: 4 }));

            expect(ranked.map((s) => s.place.id)).toEqual(['c', 'b']);
            expect(ranked.map((s) => s.aiScore)).toEqual([0.604, 0.556]);
        });

        it('should keep unrated places when the recommendable minimum allows it', () => {
            const lenient = new PreferenceScorer(0);
            const ranked = lenient.rank([makePlace({ id: 'd', rating: null })], makeProfile({ minRating: 4 }));

            expect(ranked).toHaveLength(1);
            expect(ranked[0].aiScore).toBe(0.22);
        });

        it('should drop a place scoring exactly the recommendable minimum', () => {
            const place = makePlace({ types: ['park'] });
            const profile = makeProfile({ categoryWeights: { park: 0.5 } });

            expect(scorer.score(place, profile)?.aiScore).toBe(0.3);
            expect(scorer.rank([place], profile)).toEqual([]);
        });

        it('should return an empty list for no places', () => {
            expect(scorer.rank([], makeProfile())).toEqual([]);
        });
    });

    describe('compareScoredPlaces', () => {
        const scoredPlace = (name: string, aiScore: number, reviewCount: number): ScoredPlace => ({
            place: makePlace({ id: name, name, reviewCount }),
            aiScore,
            matchReasons: [],
        });

        it('should order by score, then review count, then name by code point', () => {
            const items = [
                scoredPlace('alpha', 0.5, 10),
                scoredPlace('Zeta', 0.5, 10),
                scoredPlace('Busy', 0.5, 50),
                scoredPlace('Top', 0.9, 1),
                scoredPlace('Éclair', 0.5, 10),
            ];

            const sorted = [...items].sort(compareScoredPlaces);

            expect(sorted.map((s) => s.place.name)).toEqual(['Top', 'Busy', 'Zeta', 'alpha', 'Éclair']);
        });
    });
});
