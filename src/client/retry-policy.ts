import { setTimeout as delay } from 'node:timers/promises';
import type { RetryConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { RateLimitedError, ServiceError, TransientFetchError } from './errors.js';

const logger = getLogger();

export interface RetryOptions {
    /** Injected delay function; defaults to a timer that `signal` cancels */
    sleep?: (ms: number) => Promise<void>;
    /** Stop retrying once aborted */
    signal?: AbortSignal;
    /** Page offset, reported on the terminal error */
    offset?: number;
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Default predicate: only service failures flagged retryable
 * (timeouts, connection errors, 5xx, service-side throttling).
 */
export function isTransient(error: unknown): boolean {
    return error instanceof ServiceError && error.retryable;
}

/**
 * Bounded exponential backoff for one service call.
 *
 * Retry behaviour is plain data: construct a policy and hand it to whatever
 * issues the call. Non-retryable errors pass straight through; when the
 * attempts run out the last failure is wrapped in `TransientFetchError`.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly factor: number;
    readonly maxDelayMs: number;
    readonly jitter: boolean;
    readonly isRetryable: (error: unknown) => boolean;

    constructor(config: Partial<RetryConfig> & { isRetryable?: (error: unknown) => boolean } = {}) {
        this.maxAttempts = config.maxAttempts ?? 4;
        this.baseDelayMs = config.baseDelayMs ?? 500;
        this.factor = config.factor ?? 2;
        this.maxDelayMs = config.maxDelayMs ?? 30000;
        this.jitter = config.jitter ?? true;
        this.isRetryable = config.isRetryable ?? isTransient;

        if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
        }
    }

    /**
     * Delay before the retry that follows failed attempt number `attempt` (0-based).
     */
    delayFor(attempt: number, error?: unknown): number {
        const exponential = this.baseDelayMs * Math.pow(this.factor, attempt);
        const jitter = this.jitter ? Math.random() * exponential * 0.5 : 0;
        const backoff = Math.min(this.maxDelayMs, exponential + jitter);

        if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
            return Math.max(backoff, error.retryAfterMs);
        }
        return backoff;
    }

    async execute<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
        const sleep = options.sleep ?? ((ms: number) => abortableSleep(ms, options.signal));
        let lastError: unknown;

        for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
            if (options.signal?.aborted) {
                throw options.signal.reason;
            }

            try {
                return await fn(attempt);
            } catch (error) {
                if (!this.isRetryable(error)) throw error;
                lastError = error;

                if (attempt + 1 < this.maxAttempts) {
                    const delayMs = this.delayFor(attempt, error);
                    logger.warn(
                        { offset: options.offset, attempt: attempt + 1, backoffMs: Math.round(delayMs), error: describeError(error) },
                        'Transient failure, backing off'
                    );
                    options.onRetry?.({ attempt: attempt + 1, delayMs, error });
                    await sleep(delayMs);
                }
            }
        }

        throw new TransientFetchError(this.maxAttempts, lastError, options.offset ?? null);
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        throw signal?.aborted ? signal.reason : error;
    }
}
