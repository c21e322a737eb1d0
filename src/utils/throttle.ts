export interface ThrottleClock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: ThrottleClock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Enforces a minimum interval between successive outbound requests to one service.
 * Callers acquire immediately before issuing a request, never for a cache hit.
 */
export class RequestThrottle {
    private readonly minIntervalMs: number;
    private readonly clock: ThrottleClock;
    private lastRequestAt: number | null = null;
    private requestCount = 0;
    private pending: Promise<void> = Promise.resolve();

    constructor(minIntervalMs: number, clock: ThrottleClock = systemClock) {
        this.minIntervalMs = Math.max(0, minIntervalMs);
        this.clock = clock;
    }

    async acquire(): Promise<void> {
        // Chain so concurrent callers are spaced out rather than released together
        const turn = this.pending.then(() => this.waitForSlot());
        this.pending = turn;
        await turn;
    }

    getRequestCount(): number {
        return this.requestCount;
    }

    private async waitForSlot(): Promise<void> {
        if (this.lastRequestAt !== null) {
            const remaining = this.lastRequestAt + this.minIntervalMs - this.clock.now();
            if (remaining > 0) {
                await this.clock.sleep(remaining);
            }
        }
        this.lastRequestAt = this.clock.now();
        this.requestCount++;
    }
}
