import pLimit from 'p-limit';
import { performance } from 'node:perf_hooks';

/**
 * Time source used by the limiter. Swappable so tests can run on virtual time.
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => performance.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterOptions {
    /** Maximum grants in any trailing window */
    maxRequests: number;
    windowMs?: number;
    clock?: Clock;
}

/**
 * Sliding-window rate limiter.
 *
 * Keeps the timestamps of the grants still inside the trailing window and
 * hands out a new grant only while fewer than `maxRequests` remain. Unlike a
 * token bucket there is no burst credit: any window of `windowMs` sees at most
 * `maxRequests` grants.
 *
 * Acquisition is serialized through a single-slot queue. Callers are suspended
 * (not spinning) while the window is full; grant order is not guaranteed FIFO.
 */
export class SlidingWindowRateLimiter {
    private readonly grants: number[] = [];
    private readonly critical = pLimit(1);
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly clock: Clock;
    private grantedCount = 0;

    constructor(options: RateLimiterOptions) {
        if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
            throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
        }
        this.maxRequests = options.maxRequests;
        this.windowMs = options.windowMs ?? 1000;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Wait for a free slot and claim it.
     * @returns the grant timestamp on the limiter's clock
     */
    acquire(): Promise<number> {
        return this.critical(async () => {
            for (;;) {
                const now = this.clock.now();
                this.evict(now);

                if (this.grants.length < this.maxRequests) {
                    this.grants.push(now);
                    this.grantedCount++;
                    return now;
                }

                // Oldest grant leaves the window at grants[0] + windowMs
                const oldest = this.grants[0] ?? now;
                await this.clock.sleep(Math.max(1, oldest + this.windowMs - now));
            }
        });
    }

    /** Total grants handed out by this instance */
    get granted(): number {
        return this.grantedCount;
    }

    /** Callers currently waiting for a slot */
    get pending(): number {
        return this.critical.pendingCount + this.critical.activeCount;
    }

    private evict(now: number): void {
        while (this.grants.length > 0 && now - (this.grants[0] ?? now) >= this.windowMs) {
            this.grants.shift();
        }
    }
}
