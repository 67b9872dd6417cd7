import { describe, it, expect } from 'vitest';
import { UpstreamSemaphore } from './upstream-semaphore.js';

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => { resolve = r; });
    return { promise, resolve };
}

describe('UpstreamSemaphore', () => {
    it('should reject invalid capacities', () => {
        expect(() => new UpstreamSemaphore(0)).toThrow(RangeError);
        expect(() => new UpstreamSemaphore(1.5)).toThrow('Semaphore capacity must be a positive integer, got 1.5');
    });

    it('should cap concurrent tasks at capacity', async () => {
        const semaphore = new UpstreamSemaphore(2);
        const gates = [deferred(), deferred(), deferred()];
        const started: number[] = [];

        const runs = gates.map((gate, index) => semaphore.run(async () => {
            started.push(index);
            await gate.promise;
            return index;
        }));
        await Promise.resolve();
        await Promise.resolve();

        expect(started).toEqual([0, 1]);
        expect(semaphore.inFlight).toBe(2);
        expect(semaphore.waiting).toBe(1);

        gates[0].resolve();
        gates[1].resolve();
        gates[2].resolve();

        await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
        expect(started).toEqual([0, 1, 2]);
        expect(semaphore.inFlight).toBe(0);
        expect(semaphore.waiting).toBe(0);
    });

    it('should serve waiters in FIFO order', async () => {
        const semaphore = new UpstreamSemaphore(1);
        const order: string[] = [];

        await semaphore.acquire();
        const second = semaphore.acquire().then(() => order.push('second'));
        const third = semaphore.acquire().then(() => order.push('third'));

        semaphore.release();
        await second;
        semaphore.release();
        await third;

        expect(order).toEqual(['second', 'third']);
        expect(semaphore.inFlight).toBe(1);
    });

    it('should release the slot when a task throws', async () => {
        const semaphore = new UpstreamSemaphore(1);

        await expect(semaphore.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(semaphore.inFlight).toBe(0);
    });
});
