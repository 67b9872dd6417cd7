import logger from './logger.js';
import { UpstreamUnavailableError } from '../types/errors.js';

export enum CircuitState {
    CLOSED,   // Normal operation
    OPEN,     // Failing, reject requests
    HALF_OPEN // Testing recovery
}

export interface CircuitBreakerOptions {
    failureThreshold: number; // Number of failures before opening
    cooldownMs: number;       // Time to wait before trying again (Half-Open)
    successThreshold: number; // Successes needed to close circuit
    /** Which errors count against the circuit. Defaults to all of them. */
    isFailure: (error: unknown) => boolean;
    now: () => number;
}

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private failureCount = 0;
    private successCount = 0;
    private nextAttempt = 0;
    private readonly name: string;
    private readonly options: CircuitBreakerOptions;

    constructor(name: string, options: Partial<CircuitBreakerOptions> = {}) {
        this.name = name;
        this.options = {
            failureThreshold: options.failureThreshold || 5,
            cooldownMs: options.cooldownMs || 30000, // 30 seconds
            successThreshold: options.successThreshold || 2,
            isFailure: options.isFailure || (() => true),
            now: options.now || Date.now
        };
    }

    getState(): CircuitState {
        return this.state;
    }

    /**
     * Execute a function with circuit breaker protection.
     * While open, calls are rejected with UpstreamUnavailableError.
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === CircuitState.OPEN) {
            if (this.options.now() >= this.nextAttempt) {
                this.transitionTo(CircuitState.HALF_OPEN);
            } else {
                throw new UpstreamUnavailableError(this.name, 'circuit open', {
                    retryAt: new Date(this.nextAttempt).toISOString()
                });
            }
        }

        try {
            const result = await fn();
            this.onSuccess();
            return result;
        } catch (error) {
            if (this.options.isFailure(error)) {
                this.onFailure(error);
            } else {
                this.onSuccess();
            }
            throw error;
        }
    }

    private onSuccess() {
        if (this.state === CircuitState.HALF_OPEN) {
            this.successCount++;
            if (this.successCount >= this.options.successThreshold) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            // Consecutive-failure semantics
            this.failureCount = 0;
        }
    }

    private onFailure(error: unknown) {
        this.failureCount++;
        logger.warn(
            { error: error instanceof Error ? error.message : String(error), circuit: this.name, state: CircuitState[this.state] },
            'Circuit breaker recorded failure'
        );

        if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
            this.transitionTo(CircuitState.OPEN);
        } else if (this.state === CircuitState.HALF_OPEN) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(newState: CircuitState) {
        const previous = this.state;
        this.state = newState;
        logger.info({ circuit: this.name, from: CircuitState[previous], to: CircuitState[newState] }, 'Circuit state changed');

        if (newState === CircuitState.OPEN) {
            this.nextAttempt = this.options.now() + this.options.cooldownMs;
        } else if (newState === CircuitState.CLOSED) {
            this.failureCount = 0;
            this.successCount = 0;
        } else if (newState === CircuitState.HALF_OPEN) {
            this.successCount = 0;
        }
    }
}
