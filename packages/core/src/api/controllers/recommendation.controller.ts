import { Request, Response } from 'express';
import {
    SearchParams,
    ValidationError,
    errorResponse,
    logError,
    logger,
    successResponse,
    toApplicationError
} from '@tourpick/shared';
import { RecommendationAssembler } from '../../services/recommendation-assembler.js';
import { buildProfile } from '../../services/profile-builder.js';
import { CATEGORIES, getCity, isTourismCategory } from '../../catalog/tourism-catalog.js';
import {
    CategoryRecommendationQuery,
    CategoryRecommendationQuerySchema,
    CityRecommendationQuerySchema,
    parseQuery
} from '../schemas/recommendation.schemas.js';

function profileFromQuery(query: {
    travelStyle?: CategoryRecommendationQuery['travelStyle'];
    budget?: CategoryRecommendationQuery['budget'];
    minRating?: number;
    maxPriceTier?: number;
}) {
    return buildProfile({
        travelStyle: query.travelStyle,
        budget: query.budget,
        overrides: { minRating: query.minRating, maxPriceTier: query.maxPriceTier },
    });
}

/**
 * Recommendation Controller
 * Ranked places per category for a traveller profile
 */
export class RecommendationController {
    constructor(private readonly assembler: RecommendationAssembler) { }

    /**
     * City recommendations across several categories
     * GET /api/v1/recommendations?city=bogota&travelStyle=cultural&budget=moderate
     */
    async recommendForCity(req: Request, res: Response): Promise<void> {
        try {
            const query = parseQuery(CityRecommendationQuerySchema, req.query);
            const profile = profileFromQuery(query);

            logger.info({ city: query.city, travelStyle: profile.travelStyle, categories: query.categories }, 'City recommendation request');

            const result = await this.assembler.recommendForCity(query.city, profile, query.categories, { topN: query.topN });
            res.json(successResponse(result, { requestId: req.id }));
        } catch (error) {
            this.handleError(error, req, res, 'recommendations');
        }
    }

    /**
     * Ranked places for one category
     * GET /api/v1/recommendations/:category?city=medellin
     * GET /api/v1/recommendations/:category?query=arepas&lat=4.6097&lng=-74.0817&radius=5000
     */
    async recommendCategory(req: Request, res: Response): Promise<void> {
        try {
            const category = req.params.category.trim().toLowerCase();
            const query = parseQuery(CategoryRecommendationQuerySchema, req.query);
            const profile = profileFromQuery(query);
            const params = this.categoryParams(category, query);

            logger.info({ category, query: params.query }, 'Category recommendation request');

            const ranked = await this.assembler.getRankedPlaces(category, params, profile);
            const places = query.limit !== undefined ? ranked.slice(0, query.limit) : ranked;

            res.json(successResponse({ category, params, profile, places }, { requestId: req.id }));
        } catch (error) {
            this.handleError(error, req, res, 'recommendations/:category');
        }
    }

    private categoryParams(category: string, query: CategoryRecommendationQuery): SearchParams {
        const known = isTourismCategory(category);
        const city = query.city !== undefined ? getCity(query.city) : undefined;

        let base: SearchParams | undefined;
        if (city && known) {
            base = this.assembler.cityCategoryParams(city, category);
        } else if (city) {
            base = { query: `${category} ${city.name}`, location: city.location };
        }

        const search = query.query ?? base?.query;
        if (search === undefined) {
            throw new ValidationError('either query or city is required', [{ field: 'query', message: 'Required' }]);
        }

        return {
            ...base,
            query: search,
            location: query.lat !== undefined && query.lng !== undefined ? { lat: query.lat, lng: query.lng } : base?.location,
            radius: query.radius ?? base?.radius,
            typeFilter: query.type ?? base?.typeFilter ?? (known ? CATEGORIES[category].placeType : undefined),
        };
    }

    private handleError(error: unknown, req: Request, res: Response, endpoint: string): void {
        const appError = toApplicationError(error);
        logError(error, { requestId: req.id, endpoint });
        res.status(appError.statusCode).json(errorResponse(
            appError.code,
            appError.message,
            appError.context,
            req.id
        ));
    }
}
