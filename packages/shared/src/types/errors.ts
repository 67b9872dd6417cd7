/**
 * Error hierarchy for TourPick
 * Typed errors with retry classification, context and failure points
 */

import logger from '../utils/logger.js';

export type ErrorContext = Record<string, unknown>;

/**
 * Error Category - High-level classification for errors
 */
export enum ErrorCategory {
    TRANSIENT = 'transient',        // Retry likely helps (network, 5xx)
    PERMANENT = 'permanent',        // Retry won't help (validation, bad request)
    OPERATIONAL = 'operational',    // System issue (cache, configuration)
    QUOTA = 'quota'                 // Upstream quota exhausted, back off for longer
}

/**
 * Failure Point - Where in the pipeline the error occurred
 */
export enum FailurePoint {
    CONFIG_VALIDATION = 'config_validation',
    REQUEST_VALIDATION = 'request_validation',
    CACHE_OPERATION = 'cache_operation',
    UPSTREAM_SEARCH = 'upstream_search',
    UPSTREAM_DETAILS = 'upstream_details',
    FETCH_ORCHESTRATION = 'fetch_orchestration',
    SCORING = 'scoring',
    UNKNOWN = 'unknown'
}

/**
 * Base Application Error - All custom errors extend this
 */
export class ApplicationError extends Error {
    public readonly timestamp: Date;
    public readonly context?: ErrorContext;
    public readonly category: ErrorCategory;
    public readonly failurePoint: FailurePoint;
    public readonly attemptNumber?: number;

    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly retryable: boolean = false,
        context?: ErrorContext,
        category?: ErrorCategory,
        failurePoint?: FailurePoint,
        attemptNumber?: number
    ) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;
        this.attemptNumber = attemptNumber;

        // Auto-classify if not provided
        this.category = category || this.autoClassifyCategory();
        this.failurePoint = failurePoint || FailurePoint.UNKNOWN;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Auto-classify error category based on status and retryability
     */
    private autoClassifyCategory(): ErrorCategory {
        if (this.statusCode === 429) return ErrorCategory.QUOTA;
        if (this.retryable) return ErrorCategory.TRANSIENT;
        if (this.statusCode >= 400 && this.statusCode < 500) {
            return ErrorCategory.PERMANENT;
        }
        return ErrorCategory.OPERATIONAL;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            statusCode: this.statusCode,
            retryable: this.retryable,
            category: this.category,
            failurePoint: this.failurePoint,
            attemptNumber: this.attemptNumber,
            timestamp: this.timestamp.toISOString(),
            context: this.context
        };
    }

    /**
     * Get a unique fingerprint for error grouping
     */
    getFingerprint(): string {
        return `${this.code}:${this.failurePoint}:${this.statusCode}`;
    }
}

// ==========================================
// Client Errors (4xx - Not Retryable)
// ==========================================

export class ValidationError extends ApplicationError {
    constructor(message: string, public readonly validationErrors?: Array<{ field: string; message: string }>, context?: ErrorContext) {
        super(
            message,
            'VALIDATION_ERROR',
            400,
            false,
            { validationErrors, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.REQUEST_VALIDATION
        );
    }
}

export class NotFoundError extends ApplicationError {
    constructor(resource: string, identifier?: string, context?: ErrorContext) {
        const message = identifier
            ? `${resource} not found: ${identifier}`
            : `${resource} not found`;
        super(message, 'NOT_FOUND', 404, false, { resource, identifier, ...context });
    }
}

// ==========================================
// Upstream Errors
// ==========================================

/**
 * The places API reported its quota as exhausted.
 * Not retried within the same orchestration pass.
 */
export class QuotaExceededError extends ApplicationError {
    constructor(service: string, public readonly upstreamStatus?: string, context?: ErrorContext, failurePoint?: FailurePoint) {
        super(
            `Upstream ${service} quota exceeded${upstreamStatus ? ` (${upstreamStatus})` : ''}`,
            'QUOTA_EXCEEDED',
            429,
            false,
            { service, upstreamStatus, ...context },
            ErrorCategory.QUOTA,
            failurePoint || FailurePoint.UPSTREAM_SEARCH
        );
    }
}

/**
 * Transient network or service failure. Retried a bounded number of times.
 */
export class UpstreamUnavailableError extends ApplicationError {
    constructor(service: string, reason: string, context?: ErrorContext, failurePoint?: FailurePoint, attemptNumber?: number) {
        super(
            `Upstream ${service} unavailable: ${reason}`,
            'UPSTREAM_UNAVAILABLE',
            503,
            true,
            { service, reason, ...context },
            ErrorCategory.TRANSIENT,
            failurePoint || FailurePoint.UPSTREAM_SEARCH,
            attemptNumber
        );
    }
}

/**
 * The upstream rejected the request itself (bad key, invalid parameters).
 */
export class UpstreamRequestError extends ApplicationError {
    constructor(service: string, public readonly upstreamStatus: string, context?: ErrorContext, failurePoint?: FailurePoint) {
        super(
            `Upstream ${service} rejected the request (${upstreamStatus})`,
            'UPSTREAM_REQUEST_REJECTED',
            502,
            false,
            { service, upstreamStatus, ...context },
            ErrorCategory.PERMANENT,
            failurePoint || FailurePoint.UPSTREAM_SEARCH
        );
    }
}

export class FetchAbortedError extends ApplicationError {
    constructor(category: string, context?: ErrorContext) {
        super(
            `Fetch for category '${category}' was aborted`,
            'FETCH_ABORTED',
            499,
            false,
            { category, ...context },
            ErrorCategory.PERMANENT,
            FailurePoint.FETCH_ORCHESTRATION
        );
    }
}

// ==========================================
// Service Errors (5xx)
// ==========================================

/**
 * A cache record could not be read back. Only ever logged: the cache
 * reports the record as a miss.
 */
export class CacheCorruptionError extends ApplicationError {
    constructor(key: string, reason: string, context?: ErrorContext) {
        super(
            `Cache record for '${key}' is unreadable: ${reason}`,
            'CACHE_CORRUPTION',
            500,
            false,
            { key, reason, ...context },
            ErrorCategory.OPERATIONAL,
            FailurePoint.CACHE_OPERATION
        );
    }
}

export class ConfigurationError extends ApplicationError {
    constructor(message: string, context?: ErrorContext) {
        super(
            message,
            'CONFIGURATION_ERROR',
            500,
            false,
            context,
            ErrorCategory.PERMANENT,
            FailurePoint.CONFIG_VALIDATION
        );
    }
}

export class InternalServerError extends ApplicationError {
    constructor(message: string = 'Internal server error', context?: ErrorContext) {
        super(
            message,
            'INTERNAL_SERVER_ERROR',
            500,
            false,
            context,
            ErrorCategory.OPERATIONAL
        );
    }
}

// ==========================================
// Error Utilities
// ==========================================

export function isAppError(error: unknown): error is ApplicationError {
    return error instanceof ApplicationError;
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof ApplicationError) {
        return error.retryable;
    }
    if (error instanceof Error) {
        const message = error.message.toLowerCase();
        return message.includes('timeout') || message.includes('econnreset') || message.includes('econnrefused') || message.includes('network');
    }
    return false;
}

export function getHttpStatusCode(error: unknown): number {
    if (error instanceof ApplicationError) {
        return error.statusCode;
    }
    return 500;
}

export function toApplicationError(error: unknown): ApplicationError {
    if (error instanceof ApplicationError) {
        return error;
    }
    if (error instanceof Error) {
        return new InternalServerError(error.message, { originalError: error.name });
    }
    return new InternalServerError(String(error));
}

// ==========================================
// Error Logger
// ==========================================

export function logError(error: unknown, context?: ErrorContext): void {
    const appError = toApplicationError(error);
    const logData = {
        error: {
            name: appError.name,
            message: appError.message,
            code: appError.code,
            statusCode: appError.statusCode,
            retryable: appError.retryable,
            context: appError.context,
            stack: appError.stack
        },
        ...context
    };

    if (appError.statusCode >= 500) {
        logger.error(logData, 'Server error occurred');
    } else if (appError.statusCode >= 400) {
        logger.warn(logData, 'Client error occurred');
    } else {
        logger.info(logData, 'Error occurred');
    }
}
