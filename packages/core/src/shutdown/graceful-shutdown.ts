import { Server } from 'http';
import { Request, Response, NextFunction } from 'express';
import { logger } from '@tourpick/shared';

export interface ShutdownHooks {
    beforeShutdown?: () => Promise<void>;
    onShutdown?: () => Promise<void>;
}

export class GracefulShutdown {
    private isShuttingDown = false;
    private server: Server | null = null;
    private hooks: ShutdownHooks = {};

    constructor(private readonly shutdownTimeoutMs: number = 30000) { }

    /**
     * Register HTTP server
     */
    setServer(server: Server): void {
        this.server = server;
    }

    registerHooks(hooks: ShutdownHooks): void {
        this.hooks = { ...this.hooks, ...hooks };
    }

    /**
     * Initialize graceful shutdown handlers
     */
    init(): void {
        process.on('SIGTERM', () => void this.handleShutdown('SIGTERM'));
        process.on('SIGINT', () => void this.handleShutdown('SIGINT'));

        process.on('unhandledRejection', (reason) => {
            logger.error({ reason }, 'Unhandled promise rejection');
        });

        logger.info('Graceful shutdown handlers initialized');
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    private async handleShutdown(signal: string): Promise<void> {
        if (this.isShuttingDown) {
            logger.warn('Shutdown already in progress, forcing exit...');
            process.exit(1);
        }

        this.isShuttingDown = true;
        logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

        const forceExitTimeout = setTimeout(() => {
            logger.error('Graceful shutdown timeout exceeded, forcing exit');
            process.exit(1);
        }, this.shutdownTimeoutMs);

        try {
            if (this.hooks.beforeShutdown) {
                await this.hooks.beforeShutdown();
            }

            // In-flight recommendation requests finish before the server closes
            if (this.server) {
                logger.info('Stopping HTTP server from accepting new connections');
                await this.closeServer(this.server);
            }

            if (this.hooks.onShutdown) {
                await this.hooks.onShutdown();
            }

            clearTimeout(forceExitTimeout);
            logger.info('Graceful shutdown completed successfully');
            process.exit(0);
        } catch (error: unknown) {
            logger.error({ error }, 'Error during graceful shutdown');
            clearTimeout(forceExitTimeout);
            process.exit(1);
        }
    }

    private closeServer(server: Server): Promise<void> {
        return new Promise((resolve, reject) => {
            server.close((err: Error | undefined) => {
                if (err) {
                    logger.error({ err }, 'Error closing HTTP server');
                    reject(err);
                } else {
                    logger.info('HTTP server closed successfully');
                    resolve();
                }
            });
        });
    }
}

/**
 * Ready check middleware - returns 503 during shutdown
 */
export function createReadyCheck(shutdown: GracefulShutdown) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (shutdown.isInProgress()) {
            res.status(503).json({
                success: false,
                error: { code: 'SHUTTING_DOWN', message: 'Server is shutting down' },
            });
            return;
        }
        next();
    };
}
