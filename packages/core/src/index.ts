import dotenv from 'dotenv';
import { Environment, logger, validateEnvironment } from '@tourpick/shared';
import { bootstrapServices } from './di/bootstrap.js';
import { startAPI } from './api/server.js';

// Load environment variables
dotenv.config();

/**
 * API entry point
 */
function main(): void {
    let env: Environment;
    try {
        logger.info('🔍 Starting environment validation...');
        env = validateEnvironment();
    } catch (error: unknown) {
        logger.fatal({ error }, 'Environment validation failed');
        process.exit(1);
    }

    logger.info('🚀 Starting TourPick API...');
    const { assembler } = bootstrapServices(env);
    startAPI({ assembler, corsOrigin: env.CORS_ORIGIN }, env.API_PORT);
}

main();
