import logger from '../utils/logger.js';
import { isRetryableError } from '../types/errors.js';

export interface RetryPolicy {
    maxRetries: number;        // Attempts after the first one
    baseDelayMs: number;
    backoffMultiplier: number; // 1 = constant delay
    maxDelayMs?: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
    policy: RetryPolicy;
    /** Defaults to the error's own `retryable` flag. */
    shouldRetry?: (error: unknown) => boolean;
    sleep?: Sleep;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    label?: string;
}

/**
 * Delay before retry number `attempt + 1` (attempt is zero-based).
 */
export function calculateDelay(policy: RetryPolicy, attempt: number): number {
    const delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);
    return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * policy's retries are spent. The last error is rethrown unchanged.
 */
export async function executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { policy } = options;
    const shouldRetry = options.shouldRetry ?? isRetryableError;
    const sleep = options.sleep ?? defaultSleep;

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt >= policy.maxRetries || !shouldRetry(error)) {
                throw error;
            }

            const delay = calculateDelay(policy, attempt);
            logger.warn({
                operation: options.label,
                attempt: attempt + 1,
                maxRetries: policy.maxRetries,
                delay,
                error: error instanceof Error ? error.message : String(error)
            }, 'Upstream call failed, retrying...');

            options.onRetry?.(error, attempt + 1, delay);
            await sleep(delay);
        }
    }
}
