import { createHash } from 'node:crypto';
import type { SearchResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const QUOTE_CHARS = /["'`‘’‚‛“”„‟«»]/g;

/**
 * Canonical text form of a search string used for deduplication.
 *
 * Case-insensitive, every quote style folded to `"`, runs of whitespace
 * collapsed and whitespace just inside parentheses removed.
 *
 * `( "Code  Smell" OR 'anti pattern' )` → `("code smell" or "anti pattern")`
 */
export function normalizeQuery(query: string): string {
    return query
        .toLowerCase()
        .replace(QUOTE_CHARS, '"')
        .replace(/\s+/g, ' ')
        .replace(/\(\s+/g, '(')
        .replace(/\s+\)/g, ')')
        .trim();
}

/**
 * Deterministic cache key of a search string (SHA-256 of its normalized form).
 */
export function fingerprint(query: string): string {
    return createHash('sha256').update(normalizeQuery(query)).digest('hex');
}

/**
 * In-memory cache of assembled search results, keyed by fingerprint.
 * Lives for one client/run; no eviction, nothing written to disk.
 */
export class RunCache {
    private readonly entries = new Map<string, SearchResult>();
    private hits = 0;
    private misses = 0;

    get(key: string): SearchResult | undefined {
        const result = this.entries.get(key);
        if (result) {
            this.hits++;
            logger.debug({ fingerprint: key.slice(0, 12), entries: result.entries.length }, 'Cache hit');
        } else {
            this.misses++;
        }
        return result;
    }

    put(key: string, result: SearchResult): void {
        this.entries.set(key, result);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }

    stats(): { size: number; hits: number; misses: number } {
        return { size: this.entries.size, hits: this.hits, misses: this.misses };
    }
}
