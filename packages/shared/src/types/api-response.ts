/**
 * Standard API Response Envelope
 */
export interface APIResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta?: {
        timestamp: string;
        requestId?: string;
        cached?: boolean;
    };
}

/**
 * Helper to create success response
 */
export function successResponse<T>(data: T, meta?: Partial<NonNullable<APIResponse['meta']>>): APIResponse<T> {
    return {
        success: true,
        data,
        meta: {
            timestamp: new Date().toISOString(),
            ...meta
        }
    };
}

/**
 * Helper to create error response
 */
export function errorResponse(code: string, message: string, details?: unknown, requestId?: string): APIResponse {
    return {
        success: false,
        error: {
            code,
            message,
            details
        },
        meta: {
            timestamp: new Date().toISOString(),
            requestId
        }
    };
}
