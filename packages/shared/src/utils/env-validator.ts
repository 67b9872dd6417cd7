import { z } from 'zod';
import logger from './logger.js';
import { ConfigurationError } from '../types/errors.js';

/**
 * Environment Validation Schema
 * Validated once at startup; fails fast on malformed values
 */

// Helper validators
const portValidator = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const EnvironmentSchema = z.object({
    // ==========================================
    // Core Application
    // ==========================================
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    API_PORT: portValidator.optional().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional().default('info'),
    CORS_ORIGIN: z.string().optional().default('*'),

    // ==========================================
    // Places API
    // ==========================================
    GOOGLE_PLACES_API_KEY: z.string().optional().or(z.literal('')),
    PLACES_LANGUAGE: z.string().min(2).optional().default('es'),
    UPSTREAM_TIMEOUT_MS: positiveInt.optional().default(10000),
    UPSTREAM_MAX_RETRIES: nonNegativeInt.optional().default(2),
    UPSTREAM_MAX_CONCURRENCY: positiveInt.optional().default(6),
    PLACES_CIRCUIT_FAILURE_THRESHOLD: positiveInt.optional().default(5),
    PLACES_CIRCUIT_COOLDOWN_MS: positiveInt.optional().default(30000),

    // ==========================================
    // Caching
    // ==========================================
    CACHE_BACKEND: z.enum(['file', 'memory']).optional().default('file'),
    CACHE_DIR: z.string().min(1).optional().default('.cache/places'),
    CACHE_TTL_SECONDS: positiveInt.optional().default(3600),

    // ==========================================
    // Fetching & Ranking
    // ==========================================
    SEARCH_DEFAULT_RADIUS: positiveInt.optional().default(20000),
    MAX_RESULTS_PER_CATEGORY: positiveInt.optional().default(8),
    TOP_PLACES_PER_CATEGORY: positiveInt.optional().default(5),
    DETAIL_BATCH_SIZE: positiveInt.optional().default(3),
    PACING_DELAY_MS: nonNegativeInt.optional().default(100),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let validatedEnv: Environment | null = null;

/**
 * Validate environment variables.
 * Throws a ConfigurationError listing every offending variable.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
    const result = EnvironmentSchema.safeParse(source);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            variable: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError(
            `Environment validation failed: ${issues.map((i) => `${i.variable}: ${i.message}`).join('; ')}`,
            { issues }
        );
    }

    validatedEnv = result.data;
    validateBusinessRules(validatedEnv);

    logger.info(`📦 Running in ${validatedEnv.NODE_ENV} mode`);
    return validatedEnv;
}

function validateBusinessRules(env: Environment): void {
    if (!env.GOOGLE_PLACES_API_KEY) {
        logger.warn('⚠️  GOOGLE_PLACES_API_KEY is not set. Cache hits still work; upstream fetches will fail.');
    }

    if (env.NODE_ENV === 'production' && env.CACHE_BACKEND === 'memory') {
        logger.warn('⚠️  In-memory cache in production. Cached results are lost on restart.');
    }
}

/**
 * Get validated environment (must call validateEnvironment() first)
 */
export function getEnv(): Environment {
    if (!validatedEnv) {
        throw new ConfigurationError(
            'Environment not validated yet. Call validateEnvironment() at application startup.'
        );
    }
    return validatedEnv;
}
