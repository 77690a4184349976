/**
 * Counting semaphore. Waiters are released in FIFO order.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    get inUse(): number {
        return this.permits - this.available;
    }

    acquire(): Promise<void> {
        if (this.available > 0) {
            this.available--;
            return Promise.resolve();
        }
        return new Promise((resolve) => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            // permit passes straight to the next waiter
            next();
            return;
        }
        this.available = Math.min(this.available + 1, this.permits);
    }

    async use<T>(work: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await work();
        } finally {
            this.release();
        }
    }
}

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Runs `worker` over every item with at most `limit` calls in flight. One item's
 * rejection does not stop the others; results come back in input order.
 */
export async function runWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
    const semaphore = new Semaphore(Math.max(1, limit));
    return Promise.all(
        items.map((item, index) =>
            semaphore.use(() => worker(item, index)).then(
                (value): Settled<R> => ({ ok: true, value }),
                (error: unknown): Settled<R> => ({ ok: false, error }),
            ),
        ),
    );
}
