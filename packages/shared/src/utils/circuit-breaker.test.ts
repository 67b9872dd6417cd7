import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreaker, CircuitState } from './circuit-breaker.js';
import { QuotaExceededError, UpstreamUnavailableError } from '../types/errors.js';

vi.mock('./logger.js', () => ({
    default: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

describe('CircuitBreaker', () => {
    let now: number;
    let breaker: CircuitBreaker;

    const fail = () => breaker.execute(async () => { throw new UpstreamUnavailableError('places', 'down'); });

    beforeEach(() => {
        now = 1_000;
        breaker = new CircuitBreaker('places', {
            failureThreshold: 2,
            cooldownMs: 500,
            successThreshold: 1,
            isFailure: (error) => error instanceof UpstreamUnavailableError,
            now: () => now,
        });
    });

    it('should open after consecutive failures and reject while cooling down', async () => {
        await expect(fail()).rejects.toThrow('down');
        await expect(fail()).rejects.toThrow('down');
        expect(breaker.getState()).toBe(CircuitState.OPEN);

        const call = vi.fn().mockResolvedValue('ok');
        await expect(breaker.execute(call)).rejects.toThrow('Upstream places unavailable: circuit open');
        expect(call).not.toHaveBeenCalled();
    });

    it('should close again after a successful trial call', async () => {
        await fail().catch(() => undefined);
        await fail().catch(() => undefined);

        now += 500;
        await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
        expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should reopen when the trial call fails', async () => {
        await fail().catch(() => undefined);
        await fail().catch(() => undefined);

        now += 500;
        await expect(fail()).rejects.toThrow('down');
        expect(breaker.getState()).toBe(CircuitState.OPEN);
    });

    it('should not count errors rejected by isFailure', async () => {
        const quota = () => breaker.execute(async () => { throw new QuotaExceededError('places', 'OVER_QUERY_LIMIT'); });

        await expect(quota()).rejects.toBeInstanceOf(QuotaExceededError);
        await expect(quota()).rejects.toBeInstanceOf(QuotaExceededError);
        await expect(quota()).rejects.toBeInstanceOf(QuotaExceededError);

        expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should reset the failure count after a success', async () => {
        await fail().catch(() => undefined);
        await breaker.execute(async () => 'ok');
        await fail().catch(() => undefined);

        expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });
});
