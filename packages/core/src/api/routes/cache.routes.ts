import express, { Router } from 'express';
import { CacheController } from '../controllers/cache.controller.js';
import { RecommendationAssembler } from '../../services/recommendation-assembler.js';

export function createCacheRoutes(assembler: RecommendationAssembler): Router {
    const router = express.Router();
    const controller = new CacheController(assembler);

    /**
     * @route GET /api/v1/cache/stats
     * @desc Hit/miss counters and stored entry count
     */
    router.get('/stats', (req, res) => controller.getStats(req, res));

    /**
     * @route POST /api/v1/cache/purge
     * @desc Remove expired entries, returns { removed }
     */
    router.post('/purge', (req, res) => controller.purgeExpired(req, res));

    /**
     * @route DELETE /api/v1/cache
     * @desc Remove every entry, returns { removed }
     */
    router.delete('/', (req, res) => controller.clear(req, res));

    return router;
}
