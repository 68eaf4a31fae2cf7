/**
 * Caps the number of requests a client has in flight.
 * Waiters are served in FIFO order; release() hands the slot straight to the
 * next waiter.
 */
export class RequestGate {
    private active = 0;
    private waiting: Array<() => void> = [];

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new Error(`Request gate limit must be a positive integer, got ${limit}`);
        }
    }

    async acquire(): Promise<void> {
        if (this.active < this.limit) {
            this.active++;
            return;
        }
        await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else if (this.active > 0) {
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

    getStatus(): { active: number; waiting: number; limit: number } {
        return { active: this.active, waiting: this.waiting.length, limit: this.limit };
    }
}
