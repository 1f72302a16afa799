import { SleepFn, defaultSleep } from '../core/providers/retry';

/**
 * 🎯 RATE LIMITER
 * Token bucket in requests per minute. Keeps batch runs under a provider's
 * published limit before the provider starts answering 429.
 */

export interface RateLimiterOptions {
    now?: () => number;
    sleep?: SleepFn;
}

export class RateLimiter {
    private tokens: number;
    private readonly maxTokens: number;
    private readonly msPerToken: number;
    private lastRefill: number;
    private readonly now: () => number;
    private readonly sleep: SleepFn;

    constructor(maxRequestsPerMinute: number = 60, options: RateLimiterOptions = {}) {
        if (!Number.isFinite(maxRequestsPerMinute) || maxRequestsPerMinute <= 0) {
            throw new RangeError(`maxRequestsPerMinute must be positive, got ${maxRequestsPerMinute}`);
        }
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.maxTokens = maxRequestsPerMinute;
        this.tokens = maxRequestsPerMinute;
        this.msPerToken = 60_000 / maxRequestsPerMinute;
        this.lastRefill = this.now();
    }

    private refill(): void {
        const now = this.now();
        const elapsed = now - this.lastRefill;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed / this.msPerToken);
        this.lastRefill = now;
    }

    /**
     * Resolves once a token has been taken. Returns the time spent waiting.
     * The balance goes negative while callers wait: each one holds its own slot.
     */
    async acquire(signal?: AbortSignal): Promise<number> {
        this.refill();
        this.tokens -= 1;
        if (this.tokens >= 0) return 0;

        const waitMs = Math.ceil(-this.tokens * this.msPerToken);
        await this.sleep(waitMs, signal);
        if (signal?.aborted) this.tokens += 1;
        return waitMs;
    }
}
