function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Documents-per-second budget shared by every partition worker.
 *
 * A worker reserves a full page before requesting it and releases whatever a
 * short page did not use. Reservations are taken synchronously, so concurrent
 * workers queue behind each other instead of all waking at once.
 */
export class RateLimiter {
    private balance: number;
    private updatedAt = Date.now();

    /** @param docsPerSecond 0 disables the limit */
    constructor(private readonly docsPerSecond: number) {
        this.balance = docsPerSecond;
    }

    get enabled(): boolean {
        return this.docsPerSecond > 0;
    }

    private refill(): void {
        const now = Date.now();
        const earned = ((now - this.updatedAt) * this.docsPerSecond) / 1000;
        this.balance = Math.min(this.docsPerSecond, this.balance + earned);
        this.updatedAt = now;
    }

    /** Take `count` documents from the budget, waiting while it is overdrawn */
    async reserve(count: number): Promise<void> {
        if (!this.enabled || count <= 0) return;

        this.refill();
        this.balance -= count;
        if (this.balance < 0) {
            await sleep(Math.ceil((-this.balance * 1000) / this.docsPerSecond));
        }
    }

    release(count: number): void {
        if (!this.enabled || count <= 0) return;

        this.refill();
        this.balance = Math.min(this.docsPerSecond, this.balance + count);
    }
}
