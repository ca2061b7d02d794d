/**
 * FIFO concurrency limiter. Tasks beyond the limit wait in arrival order
 * until a running task settles.
 */
export class ConcurrencyLimiter {
    private active = 0;
    private waiting: (() => void)[] = [];

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
        }
    }

    get running(): number {
        return this.active;
    }

    get pending(): number {
        return this.waiting.length;
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.limit) {
            this.active++;
            return Promise.resolve();
        }
        return new Promise(resolve => this.waiting.push(resolve));
    }

    private release(): void {
        const next = this.waiting.shift();
        // The slot passes straight to the next waiter, so `active` stays put.
        if (next) next();
        else this.active--;
    }
}
