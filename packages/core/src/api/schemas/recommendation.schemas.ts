import { z } from 'zod';
import { ValidationError } from '@tourpick/shared';
import { TOURISM_CATEGORIES } from '../../catalog/tourism-catalog.js';
import { BUDGET_LEVELS, TRAVEL_STYLES } from '../../services/profile-builder.js';

const ProfileQueryFields = {
    travelStyle: z.enum(TRAVEL_STYLES).optional(),
    budget: z.enum(BUDGET_LEVELS).optional(),
    minRating: z.coerce.number().min(0).max(5).optional(),
    maxPriceTier: z.coerce.number().int().min(0).max(4).optional(),
};

/**
 * GET /api/v1/recommendations
 */
export const CityRecommendationQuerySchema = z.object({
    city: z.string().trim().min(1, 'city is required'),
    categories: z.string().optional()
        .transform((value) => value
            ? [...new Set(value.split(',').map((part) => part.trim().toLowerCase()).filter((part) => part.length > 0))]
            : undefined)
        .pipe(z.array(z.enum(TOURISM_CATEGORIES)).min(1).optional()),
    topN: z.coerce.number().int().min(1).max(20).optional(),
    ...ProfileQueryFields,
});

/**
 * GET /api/v1/recommendations/:category
 */
export const CategoryRecommendationQuerySchema = z.object({
    query: z.string().trim().min(1).optional(),
    city: z.string().trim().min(1).optional(),
    lat: z.coerce.number().min(-90).max(90).optional(),
    lng: z.coerce.number().min(-180).max(180).optional(),
    radius: z.coerce.number().int().positive().max(50000).optional(),
    type: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(20).optional(),
    ...ProfileQueryFields,
}).refine((value) => (value.lat === undefined) === (value.lng === undefined), {
    message: 'lat and lng must be given together',
    path: ['lat'],
}).refine((value) => value.query !== undefined || value.city !== undefined, {
    message: 'either query or city is required',
    path: ['query'],
});

export type CityRecommendationQuery = z.infer<typeof CityRecommendationQuerySchema>;
export type CategoryRecommendationQuery = z.infer<typeof CategoryRecommendationQuerySchema>;

/**
 * Parse with a schema, throwing ValidationError with per-field messages.
 */
export function parseQuery<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            field: issue.path.join('.'),
            message: issue.message,
        }));
        throw new ValidationError('Invalid query parameters', issues);
    }
    return result.data;
}
