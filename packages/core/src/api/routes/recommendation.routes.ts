import express, { Router } from 'express';
import { RecommendationController } from '../controllers/recommendation.controller.js';
import { RecommendationAssembler } from '../../services/recommendation-assembler.js';

export function createRecommendationRoutes(assembler: RecommendationAssembler): Router {
    const router = express.Router();
    const controller = new RecommendationController(assembler);

    /**
     * @route GET /api/v1/recommendations
     * @desc Ranked places per category for a known city
     * @access Public
     *
     * @example Default categories (restaurants, attractions, hotels)
     * GET /api/v1/recommendations?city=bogota&travelStyle=cultural&budget=moderate
     *
     * @example Chosen categories, stricter profile
     * GET /api/v1/recommendations?city=medellin&categories=museums,parks&minRating=4.5
     *
     * Query Parameters:
     * - city (required): City key ("bogota", "medellin", ...; accents ignored)
     * - categories (optional): Comma-separated tourism categories
     * - travelStyle (optional): cultural | adventure | relaxed | family | business (default: cultural)
     * - budget (optional): budget | moderate | luxury (default: moderate)
     * - minRating (optional): Overrides the style's minimum rating (0-5)
     * - maxPriceTier (optional): Overrides the price tier cap (0-4)
     * - topN (optional): Places returned per category (default: 5)
     *
     * Response:
     * {
     *   "success": true,
     *   "data": {
     *     "city": { "key": "bogota", "name": "Bogotá", "location": { "lat": 4.6097, "lng": -74.0817 } },
     *     "categories": {
     *       "restaurants": { "totalFound": 8, "aiFiltered": 6, "places": [ { "place": {...}, "aiScore": 0.8123, "matchReasons": ["high rating"] } ] },
     *       "hotels": { "totalFound": 0, "aiFiltered": 0, "places": [], "error": { "code": "QUOTA_EXCEEDED", "message": "..." } }
     *     }
     *   }
     * }
     */
    router.get('/', (req, res) => controller.recommendForCity(req, res));

    /**
     * @route GET /api/v1/recommendations/:category
     * @desc Ranked places for one category, from a city or an explicit search
     * @access Public
     *
     * @example
     * GET /api/v1/recommendations/restaurants?city=cali&travelStyle=family
     * GET /api/v1/recommendations/cafes?query=cafe+de+origen&lat=4.6097&lng=-74.0817&radius=3000
     *
     * Query Parameters:
     * - query or city (one required)
     * - lat, lng (optional, together): Search centre
     * - radius (optional): Metres
     * - type (optional): Upstream type filter (defaults to the category's)
     * - limit (optional): Maximum ranked places returned
     * - travelStyle, budget, minRating, maxPriceTier: As above
     */
    router.get('/:category', (req, res) => controller.recommendCategory(req, res));

    return router;
}
