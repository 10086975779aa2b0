import { describe, it, expect } from 'vitest';
import { CredentialPool, partitionCredentials } from '../client/credential-pool.js';
import { PoolExhaustedError } from '../client/errors.js';
import { SlidingWindowRateLimiter } from '../client/rate-limiter.js';
import { VirtualClock } from './fakes.js';

function makePool(tokens: string[], maxRequests = 100): { pool: CredentialPool; limiter: SlidingWindowRateLimiter } {
    const limiter = new SlidingWindowRateLimiter({ maxRequests, clock: new VirtualClock() });
    return { pool: new CredentialPool(tokens, limiter), limiter };
}

describe('CredentialPool', () => {
    it('should hand out credentials round-robin', async () => {
        const { pool } = makePool(['test-key-a', 'test-key-b', 'test-key-c']);

        const ids: string[] = [];
        for (let i = 0; i < 4; i++) {
            ids.push((await pool.acquire()).id);
        }

        expect(ids).toEqual(['key-1', 'key-2', 'key-3', 'key-1']);
    });

    it('should trim, dedupe and drop empty tokens', async () => {
        const { pool } = makePool([' test-key-a ', 'test-key-a', '', 'test-key-b']);

        expect(pool.size).toBe(2);
        expect((await pool.acquire()).token).toBe('test-key-a');
        expect((await pool.acquire()).token).toBe('test-key-b');
    });

    it('should skip exhausted credentials', async () => {
        const { pool } = makePool(['test-key-a', 'test-key-b', 'test-key-c']);
        const first = await pool.acquire();
        const second = await pool.acquire();

        pool.markExhausted(second);

        expect(first.id).toBe('key-1');
        expect((await pool.acquire()).id).toBe('key-3');
        expect((await pool.acquire()).id).toBe('key-1');
        expect(pool.isExhausted('key-2')).toBe(true);
        expect(pool.available).toBe(2);
    });

    it('should treat repeated exhaustion of one credential as a single event', async () => {
        const { pool } = makePool(['test-key-a', 'test-key-b']);
        const credential = await pool.acquire();

        pool.markExhausted(credential);
        pool.markExhausted(credential, new Date(0));

        expect(pool.available).toBe(1);
    });

    it('should fail with PoolExhaustedError once every credential is exhausted', async () => {
        const { pool, limiter } = makePool(['test-key-a', 'test-key-b']);
        pool.markExhausted(await pool.acquire());
        pool.markExhausted(await pool.acquire());
        const granted = limiter.granted;

        await expect(pool.acquire()).rejects.toBeInstanceOf(PoolExhaustedError);
        await expect(pool.acquire()).rejects.toThrow('All 2 credentials are exhausted');
        // Failing fast: no rate-limiter slot is consumed
        expect(limiter.granted).toBe(granted);
    });

    it('should fail immediately when no credentials were configured', async () => {
        const { pool } = makePool([]);

        await expect(pool.acquire()).rejects.toThrow('No credentials were configured');
    });

    it('should fail a waiting caller whose last credential is exhausted meanwhile', async () => {
        const { pool } = makePool(['test-key-a'], 1);

        const first = pool.acquire();
        const second = pool.acquire();
        pool.markExhausted(await first);

        await expect(second).rejects.toBeInstanceOf(PoolExhaustedError);
    });
});

describe('partitionCredentials', () => {
    it('should split keys into contiguous disjoint groups', () => {
        expect(partitionCredentials(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b', 'c'], ['d', 'e']]);
    });

    it('should leave trailing groups empty when keys run short', () => {
        expect(partitionCredentials(['a'], 3)).toEqual([['a'], [], []]);
    });

    it('should reject a non-positive group count', () => {
        expect(() => partitionCredentials(['a'], 0)).toThrow(RangeError);
    });
});
