/**
 * Counting semaphore capping concurrent upstream calls across the process.
 * Waiters are served in FIFO order.
 */
export class UpstreamSemaphore {
    private active = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(public readonly capacity: number = 6) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
        }
    }

    get inFlight(): number {
        return this.active;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<void> {
        if (this.active < this.capacity) {
            this.active++;
            return;
        }
        // Slot is handed over directly by release(), active stays unchanged
        await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
            return;
        }
        if (this.active > 0) {
            this.active--;
        }
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }
}
