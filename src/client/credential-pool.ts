import type { Credential } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { divide } from '../utils/partition.js';
import { PoolExhaustedError } from './errors.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';

const logger = getLogger();

/**
 * Round-robin pool of API credentials behind a shared rate limiter.
 *
 * The pool owns the exhausted state of every credential. Credentials are not
 * leased: several in-flight requests may use the same one. Once marked
 * exhausted a credential never returns to rotation during this run.
 */
export class CredentialPool {
    private readonly credentials: readonly Credential[];
    private readonly exhausted = new Set<string>();
    private cursor = 0;

    constructor(
        tokens: readonly string[],
        private readonly limiter: SlidingWindowRateLimiter
    ) {
        const unique = [...new Set(tokens.map((t) => t.trim()).filter((t) => t.length > 0))];
        this.credentials = unique.map((token, index) => Object.freeze({ id: `key-${index + 1}`, token }));
    }

    /**
     * Wait for a rate-limiter slot and return the next usable credential.
     * Fails with `PoolExhaustedError` instead of waiting when none is left.
     */
    async acquire(): Promise<Credential> {
        this.assertNotExhausted();
        await this.limiter.acquire();
        // Another caller may have exhausted the last key while we waited
        this.assertNotExhausted();
        return this.next();
    }

    /**
     * Permanently remove a credential from rotation.
     * @param resetsAt - When the service says the quota resets, if known
     */
    markExhausted(credential: Credential, resetsAt: Date | null = null): void {
        if (this.exhausted.has(credential.id)) return;

        this.exhausted.add(credential.id);
        logger.warn(
            { credential: credential.id, resetsAt: resetsAt?.toISOString() ?? null, remaining: this.available },
            'Credential exhausted, removed from rotation'
        );
    }

    isExhausted(id: string): boolean {
        return this.exhausted.has(id);
    }

    /** Number of credentials still in rotation */
    get available(): number {
        return this.credentials.length - this.exhausted.size;
    }

    get size(): number {
        return this.credentials.length;
    }

    private assertNotExhausted(): void {
        if (this.available <= 0) {
            throw new PoolExhaustedError(this.credentials.length);
        }
    }

    private next(): Credential {
        for (let step = 0; step < this.credentials.length; step++) {
            const credential = this.credentials[(this.cursor + step) % this.credentials.length];
            if (credential && !this.exhausted.has(credential.id)) {
                this.cursor = (this.cursor + step + 1) % this.credentials.length;
                return credential;
            }
        }
        throw new PoolExhaustedError(this.credentials.length);
    }
}

/**
 * Split a key list into `n` disjoint contiguous groups.
 * Earlier groups take one extra key when the split is uneven; groups may be
 * empty when there are fewer keys than groups.
 */
export function partitionCredentials(tokens: readonly string[], n: number): string[][] {
    return divide(tokens, n);
}
