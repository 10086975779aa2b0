import { createPageRequest, DEFAULT_CONFIG } from '../types/index.js';
import type { Entry, PageRequest, SearchPage, SearchResult, SearchService, SlrSearchConfig } from '../types/index.js';
import { fingerprint, RunCache } from '../cache/run-cache.js';
import { ScopusSearchService } from '../sources/scopus.js';
import { getLogger } from '../utils/logger.js';
import { CredentialPool } from './credential-pool.js';
import { CredentialRejectedError } from './errors.js';
import { SlidingWindowRateLimiter, type Clock } from './rate-limiter.js';
import { RetryPolicy } from './retry-policy.js';

const logger = getLogger();

export interface SearchClientOptions {
    service: SearchService;
    pool: CredentialPool;
    retryPolicy?: RetryPolicy;
    cache?: RunCache;
    pageSize?: number;
    /** The service never pages past this many results */
    maxResults?: number;
    /** Pages of one query allowed in flight at once */
    pageConcurrency?: number;
    /** Delay function for retry backoff */
    sleep?: (ms: number) => Promise<void>;
}

export interface SearchClientStats {
    requests: number;
    cache: { size: number; hits: number; misses: number };
    credentialsAvailable: number;
}

/**
 * Outcome of a page task. Prefetched pages never reject, so a page that is
 * discarded after cancellation cannot surface as an unhandled rejection.
 */
type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
    return promise.then(
        (value): Settled<T> => ({ ok: true, value }),
        (error: unknown): Settled<T> => ({ ok: false, error })
    );
}

/**
 * Paginated client for a rate-limited search service.
 *
 * Every request goes through the credential pool (and therefore the shared
 * rate limiter) and is wrapped by the retry policy. Results of complete walks
 * are memoized in a run-scoped cache keyed by the query fingerprint.
 */
export class SearchClient {
    private readonly service: SearchService;
    private readonly pool: CredentialPool;
    private readonly retryPolicy: RetryPolicy;
    private readonly cache: RunCache;
    private readonly pageSize: number;
    private readonly maxResults: number;
    private readonly pageConcurrency: number;
    private readonly sleep?: (ms: number) => Promise<void>;
    private requestCount = 0;

    constructor(options: SearchClientOptions) {
        this.service = options.service;
        this.pool = options.pool;
        this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
        this.cache = options.cache ?? new RunCache();
        this.pageSize = options.pageSize ?? DEFAULT_CONFIG.pageSize;
        this.maxResults = options.maxResults ?? DEFAULT_CONFIG.maxResults;
        this.pageConcurrency = Math.max(1, options.pageConcurrency ?? DEFAULT_CONFIG.pageConcurrency);
        this.sleep = options.sleep;
    }

    /**
     * Lazily walk every page of `query`, in offset order.
     *
     * The first page is fetched alone to learn the total; later pages are
     * prefetched with at most `pageConcurrency` in flight. The walk ends when
     * the reported total (capped at `maxResults`) is covered or a page comes
     * back empty. Any error, or the consumer stopping early, cancels the walk:
     * no further pages are requested and in-flight ones are discarded.
     *
     * An entry whose id was already seen in the same walk, on an earlier page
     * or earlier in the same page, is dropped.
     */
    async *search(query: string): AsyncGenerator<SearchPage, void, undefined> {
        const key = fingerprint(query);
        const cached = this.cache.get(key);
        if (cached) {
            yield {
                query,
                offset: 0,
                entries: cached.entries,
                totalResults: cached.totalResults,
                fromCache: true,
            };
            return;
        }

        const controller = new AbortController();
        const seen = new Set<string>();
        const collected: Entry[] = [];

        const accept = (page: SearchPage): SearchPage => {
            const fresh: Entry[] = [];
            for (const entry of page.entries) {
                if (seen.has(entry.id)) continue;
                seen.add(entry.id);
                fresh.push(entry);
            }
            if (fresh.length < page.entries.length) {
                logger.warn(
                    { offset: page.offset, duplicates: page.entries.length - fresh.length },
                    'Dropped entries already returned in this walk'
                );
            }
            collected.push(...fresh);
            return { ...page, entries: fresh };
        };

        try {
            const firstSize = Math.min(this.pageSize, this.maxResults);
            const first = await this.fetchPage(createPageRequest(query, 0, firstSize), controller.signal);
            const totalResults = first.totalResults;
            const limit = Math.min(totalResults, this.maxResults);

            logger.debug({ totalResults, pages: Math.ceil(limit / this.pageSize) }, 'Search started');
            yield accept(first);

            if (first.entries.length > 0) {
                const offsets: number[] = [];
                for (let offset = firstSize; offset < limit; offset += this.pageSize) {
                    offsets.push(offset);
                }

                const inFlight: Array<Promise<Settled<SearchPage>>> = [];
                let next = 0;
                const schedule = (): void => {
                    while (inFlight.length < this.pageConcurrency && next < offsets.length) {
                        const offset = offsets[next++] ?? 0;
                        // The last page stops at the limit
                        const request = createPageRequest(query, offset, Math.min(this.pageSize, limit - offset));
                        inFlight.push(settle(this.fetchPage(request, controller.signal)));
                    }
                };

                schedule();
                for (let head = inFlight.shift(); head; head = inFlight.shift()) {
                    const settled = await head;
                    if (!settled.ok) throw settled.error;
                    if (settled.value.entries.length === 0) break;

                    const page = accept(settled.value);
                    schedule();
                    yield page;
                }
            }

            // Only a complete walk is memoized
            this.cache.put(key, {
                query,
                fingerprint: key,
                entries: collected,
                totalResults,
                truncated: totalResults > this.maxResults,
            });
            logger.debug({ entries: collected.length, totalResults }, 'Search complete');
        } finally {
            controller.abort();
        }
    }

    /**
     * Run `search()` to completion and assemble the result.
     * There is no partial result: any failure rejects the whole call.
     */
    async collect(query: string): Promise<SearchResult> {
        const entries: Entry[] = [];
        let totalResults = 0;

        for await (const page of this.search(query)) {
            if (page.offset === 0) totalResults = page.totalResults;
            entries.push(...page.entries);
        }

        return {
            query,
            fingerprint: fingerprint(query),
            entries,
            totalResults,
            truncated: totalResults > this.maxResults,
        };
    }

    stats(): SearchClientStats {
        return {
            requests: this.requestCount,
            cache: this.cache.stats(),
            credentialsAvailable: this.pool.available,
        };
    }

    get credentialCount(): number {
        return this.pool.size;
    }

    /**
     * One page under the retry policy.
     */
    private fetchPage(request: PageRequest, signal: AbortSignal): Promise<SearchPage> {
        return this.retryPolicy.execute(() => this.attemptPage(request, signal), {
            signal,
            offset: request.offset,
            sleep: this.sleep,
        });
    }

    /**
     * One attempt at a page. A rejected credential is retired and the same
     * page is re-issued with the next one; that does not use up a retry.
     */
    private async attemptPage(request: PageRequest, signal: AbortSignal): Promise<SearchPage> {
        for (;;) {
            const credential = await this.pool.acquire();
            if (signal.aborted) throw signal.reason;

            this.requestCount++;
            try {
                return await this.service.fetchPage(request, credential, signal);
            } catch (error) {
                if (!(error instanceof CredentialRejectedError)) throw error;
                this.pool.markExhausted(credential, error.resetsAt);
            }
        }
    }
}

/**
 * Build a client with its own limiter, pool, cache and retry policy.
 */
export function createSearchClient(
    tokens: readonly string[],
    config: SlrSearchConfig = DEFAULT_CONFIG,
    options: { service?: SearchService; clock?: Clock; sleep?: (ms: number) => Promise<void> } = {}
): SearchClient {
    const limiter = new SlidingWindowRateLimiter({
        maxRequests: config.maxRequestsPerSecond,
        windowMs: config.windowMs,
        clock: options.clock,
    });

    return new SearchClient({
        service: options.service ?? new ScopusSearchService({ timeoutMs: config.timeoutMs }),
        pool: new CredentialPool(tokens, limiter),
        retryPolicy: new RetryPolicy(config.retry),
        cache: new RunCache(),
        pageSize: config.pageSize,
        maxResults: config.maxResults,
        pageConcurrency: config.pageConcurrency,
        sleep: options.sleep,
    });
}
