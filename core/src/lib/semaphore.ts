/**
 * Counting semaphore for the event loop. Waiters are admitted in FIFO order;
 * a released permit is handed straight to the next waiter.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    get free(): number {
        return this.available;
    }

    async acquire(): Promise<() => void> {
        if (this.available > 0) {
            this.available--;
        } else {
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }
        return this.releaser();
    }

    async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    private releaser(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this.waiters.shift();
            if (next) {
                next();
            } else {
                this.available++;
            }
        };
    }
}
