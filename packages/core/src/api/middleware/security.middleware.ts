import helmet from 'helmet';
import cors, { CorsOptions } from 'cors';
import { RequestHandler } from 'express';
import { logger } from '@tourpick/shared';

/**
 * Security headers middleware using Helmet
 */
export const securityHeaders = helmet({
    contentSecurityPolicy: {
        directives: {
            defaultSrc: ["'none'"],
            frameAncestors: ["'none'"],
        },
    },
    hsts: {
        maxAge: 31536000, // 1 year
        includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
});

/**
 * Origin check for the read-only API.
 * Requests without an Origin header (curl, server-to-server) are always allowed.
 */
export function isOriginAllowed(origin: string | undefined, allowList: string): boolean {
    if (!origin) return true;
    const allowed = allowList.split(',').map((o) => o.trim()).filter(Boolean);
    return allowed.includes('*') || allowed.includes(origin);
}

export function createCorsMiddleware(allowList: string): RequestHandler {
    const options: CorsOptions = {
        origin: (origin, callback) => {
            if (isOriginAllowed(origin, allowList)) {
                callback(null, true);
                return;
            }
            logger.warn({ origin }, 'CORS request from unauthorized origin');
            callback(null, false);
        },
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'X-Request-ID', 'X-Correlation-ID'],
        exposedHeaders: ['X-Request-ID', 'X-Correlation-ID'],
        maxAge: 86400, // 24 hours
    };
    return cors(options);
}
