import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { contextStorage, LogContext } from '@tourpick/shared';

// Extend Express Request to include ID and Correlation ID
declare global {
    namespace Express {
        interface Request {
            id?: string;
            correlationId?: string;
        }
    }
}

function headerValue(value: string | string[] | undefined): string | undefined {
    const first = Array.isArray(value) ? value[0] : value;
    return first && first.trim().length > 0 ? first.trim() : undefined;
}

/**
 * Request ID Middleware
 * Accepts or generates request/correlation IDs and runs the rest of the
 * request inside a logging context carrying them
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
    req.id = headerValue(req.headers['x-request-id']) ?? uuidv4();
    req.correlationId = headerValue(req.headers['x-correlation-id']) ?? req.id;

    res.setHeader('X-Request-ID', req.id);
    res.setHeader('X-Correlation-ID', req.correlationId);

    const store: LogContext = new Map();
    store.set('requestId', req.id);
    store.set('correlationId', req.correlationId);

    contextStorage.run(store, () => next());
}
