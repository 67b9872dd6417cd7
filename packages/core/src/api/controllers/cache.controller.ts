import { Request, Response } from 'express';
import { errorResponse, logError, logger, successResponse, toApplicationError } from '@tourpick/shared';
import { RecommendationAssembler } from '../../services/recommendation-assembler.js';

/**
 * Cache maintenance endpoints
 */
export class CacheController {
    constructor(private readonly assembler: RecommendationAssembler) { }

    /**
     * GET /api/v1/cache/stats
     */
    async getStats(req: Request, res: Response): Promise<void> {
        try {
            const stats = await this.assembler.cacheStats();
            res.json(successResponse(stats, { requestId: req.id }));
        } catch (error) {
            this.handleError(error, req, res, 'cache/stats');
        }
    }

    /**
     * POST /api/v1/cache/purge
     */
    async purgeExpired(req: Request, res: Response): Promise<void> {
        try {
            const removed = await this.assembler.purgeExpiredCache();
            logger.info({ removed }, 'Expired cache entries purged via API');
            res.json(successResponse({ removed }, { requestId: req.id }));
        } catch (error) {
            this.handleError(error, req, res, 'cache/purge');
        }
    }

    /**
     * DELETE /api/v1/cache
     */
    async clear(req: Request, res: Response): Promise<void> {
        try {
            const removed = await this.assembler.clearCache();
            logger.warn({ removed }, 'Cache cleared via API');
            res.json(successResponse({ removed }, { requestId: req.id }));
        } catch (error) {
            this.handleError(error, req, res, 'cache');
        }
    }

    private handleError(error: unknown, req: Request, res: Response, endpoint: string): void {
        const appError = toApplicationError(error);
        logError(error, { requestId: req.id, endpoint });
        res.status(appError.statusCode).json(errorResponse(appError.code, appError.message, undefined, req.id));
    }
}
