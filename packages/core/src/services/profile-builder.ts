import { z } from 'zod';
import { BudgetLevel, TravelStyle, UserPreferenceProfile, ValidationError } from '@tourpick/shared';

export const TRAVEL_STYLES = ['cultural', 'adventure', 'relaxed', 'family', 'business'] as const satisfies readonly TravelStyle[];
export const BUDGET_LEVELS = ['budget', 'moderate', 'luxury'] as const satisfies readonly BudgetLevel[];

interface TravelStylePreset {
    preferredTypes: readonly string[]; // Most preferred first
    minRating: number;
    maxPriceTier: number;
}

export const TRAVEL_STYLE_PRESETS: Readonly<Record<TravelStyle, TravelStylePreset>> = Object.freeze({
    cultural: { preferredTypes: ['museum', 'art_gallery', 'tourist_attraction'], minRating: 4.0, maxPriceTier: 4 },
    adventure: { preferredTypes: ['park', 'tourist_attraction', 'natural_feature'], minRating: 3.5, maxPriceTier: 3 },
    relaxed: { preferredTypes: ['spa', 'park', 'restaurant'], minRating: 4.0, maxPriceTier: 4 },
    family: { preferredTypes: ['park', 'tourist_attraction', 'restaurant'], minRating: 3.5, maxPriceTier: 3 },
    business: { preferredTypes: ['restaurant', 'lodging', 'shopping_mall'], minRating: 4.0, maxPriceTier: 4 },
});

export const BUDGET_PRICE_CAPS: Readonly<Record<BudgetLevel, number>> = Object.freeze({
    budget: 2,
    moderate: 3,
    luxury: 4,
});

// Weight given to a style's preferred types, by rank
const PREFERENCE_WEIGHTS = [1.0, 0.8, 0.6];

export const UserPreferenceProfileSchema = z.object({
    minRating: z.number().min(0).max(5),
    maxPriceTier: z.number().int().min(0).max(4),
    travelStyle: z.enum(TRAVEL_STYLES),
    categoryWeights: z.record(z.string().min(1), z.number().min(0)),
    budget: z.enum(BUDGET_LEVELS),
});

export interface BuildProfileInput {
    travelStyle?: TravelStyle;
    budget?: BudgetLevel;
    overrides?: Partial<UserPreferenceProfile>;
}

export function presetCategoryWeights(travelStyle: TravelStyle): Record<string, number> {
    const weights: Record<string, number> = {};
    TRAVEL_STYLE_PRESETS[travelStyle].preferredTypes.forEach((type, index) => {
        weights[type] = PREFERENCE_WEIGHTS[Math.min(index, PREFERENCE_WEIGHTS.length - 1)];
    });
    return weights;
}

/**
 * Profile from a travel style and budget. The budget caps the style's
 * price tier; explicit overrides win over both.
 */
export function buildProfile(input: BuildProfileInput = {}): UserPreferenceProfile {
    const travelStyle = input.overrides?.travelStyle ?? input.travelStyle ?? 'cultural';
    const budget = input.overrides?.budget ?? input.budget ?? 'moderate';
    const preset = TRAVEL_STYLE_PRESETS[travelStyle];

    // Keys explicitly set to undefined do not override
    const overrides = Object.fromEntries(
        Object.entries(input.overrides ?? {}).filter(([, value]) => value !== undefined)
    );

    const candidate = {
        minRating: preset.minRating,
        maxPriceTier: Math.min(preset.maxPriceTier, BUDGET_PRICE_CAPS[budget]),
        categoryWeights: presetCategoryWeights(travelStyle),
        ...overrides,
        travelStyle,
        budget,
    };

    const result = UserPreferenceProfileSchema.safeParse(candidate);
    if (!result.success) {
        throw new ValidationError(
            'Invalid preference profile',
            result.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
        );
    }

    return Object.freeze({
        ...result.data,
        categoryWeights: Object.freeze({ ...result.data.categoryWeights }),
    });
}
