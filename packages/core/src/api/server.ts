import express, { Express, Request, Response } from 'express';
import compression from 'compression';
import { Server } from 'http';
import { getMetrics, initMetrics, logger } from '@tourpick/shared';
import { RecommendationAssembler } from '../services/recommendation-assembler.js';
import { createRecommendationRoutes } from './routes/recommendation.routes.js';
import { createCacheRoutes } from './routes/cache.routes.js';
import { globalErrorHandler, notFoundHandler } from './middleware/error.middleware.js';
import { requestIdMiddleware } from './middleware/request-id.middleware.js';
import { createCorsMiddleware, securityHeaders } from './middleware/security.middleware.js';
import { GracefulShutdown, createReadyCheck } from '../shutdown/graceful-shutdown.js';

export interface AppDependencies {
    assembler: RecommendationAssembler;
    shutdown?: GracefulShutdown;
    /** Comma-separated list of allowed origins, '*' for any */
    corsOrigin?: string;
}

export function createApp({ assembler, shutdown, corsOrigin = '*' }: AppDependencies): Express {
    const app = express();

    initMetrics();

    // Security middleware (must be early)
    app.use(securityHeaders);
    app.use(createCorsMiddleware(corsOrigin));

    app.use(express.json({ limit: '100kb' }));
    app.use(requestIdMiddleware);
    app.use(compression({ threshold: 1024 }));

    if (shutdown) {
        app.use(createReadyCheck(shutdown));
    }

    /**
     * Health Check Endpoint
     */
    app.get('/health', async (req: Request, res: Response) => {
        try {
            const cache = await assembler.cacheStats();
            res.json({
                status: 'healthy',
                timestamp: new Date().toISOString(),
                cache
            });
        } catch (error: unknown) {
            logger.error({ error }, 'Health check failed');
            res.status(500).json({
                status: 'unhealthy',
                error: error instanceof Error ? error.message : String(error)
            });
        }
    });

    /**
     * Metrics Endpoint (Prometheus-compatible)
     */
    app.get('/metrics', async (req: Request, res: Response) => {
        try {
            const metrics = await getMetrics();
            res.set('Content-Type', 'text/plain');
            res.send(metrics);
        } catch (error) {
            logger.error({ error }, 'Failed to get metrics');
            res.status(500).send('Error generating metrics');
        }
    });

    app.use('/api/v1/recommendations', createRecommendationRoutes(assembler));
    app.use('/api/v1/cache', createCacheRoutes(assembler));

    // 404 handler (after all routes)
    app.use(notFoundHandler);

    // Global error handler (must be last)
    app.use(globalErrorHandler);

    return app;
}

/**
 * Start API Server
 */
export function startAPI(deps: AppDependencies, port: number): Server {
    const shutdown = deps.shutdown ?? new GracefulShutdown();
    const app = createApp({ ...deps, shutdown });

    const server = app.listen(port, () => {
        logger.info(`🌐 API server listening on port ${port}`);
        logger.info(`   Health: http://localhost:${port}/health`);
        logger.info(`   Metrics: http://localhost:${port}/metrics`);
        logger.info(`   Recommendations: http://localhost:${port}/api/v1/recommendations?city=bogota`);
    });

    shutdown.setServer(server);
    shutdown.registerHooks({
        onShutdown: async () => {
            const stats = await deps.assembler.cacheStats();
            logger.info({ cache: stats }, 'Final cache stats');
        },
    });
    shutdown.init();

    return server;
}
