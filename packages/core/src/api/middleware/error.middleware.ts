import { Request, Response, NextFunction } from 'express';
import { errorResponse, logError, logger, toApplicationError } from '@tourpick/shared';

/**
 * Global error handler middleware
 * Must be registered last in middleware chain
 */
export function globalErrorHandler(
    error: unknown,
    req: Request,
    res: Response,
    // Express recognises error handlers by arity
    _next: NextFunction
): void {
    logError(error, {
        requestId: req.id,
        method: req.method,
        path: req.path,
        ip: req.ip,
        userAgent: req.get('user-agent')
    });

    const appError = toApplicationError(error);

    res.status(appError.statusCode).json(errorResponse(
        appError.code,
        appError.message,
        appError.context,
        req.id
    ));
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
    logger.warn({
        requestId: req.id,
        method: req.method,
        path: req.path
    }, 'Route not found');

    res.status(404).json(errorResponse(
        'NOT_FOUND',
        `Route ${req.method} ${req.path} not found`,
        undefined,
        req.id
    ));
}
